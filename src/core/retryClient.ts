import type { Logger, MetricsRegistry } from "../observability";
import { errorMessage, FetchExhaustedError } from "./errors";
import { buildUrl, type FetchLike, type QueryParams, type ResponseLike } from "./fetch";

export interface HttpResult {
  url: string;
  status: number;
  contentType: string;
  headers: Record<string, string>;
  body: string;
}

export interface RequestOptions {
  params?: QueryParams;
  headers?: Record<string, string>;
}

export interface RetryClientOptions {
  fetchFn: FetchLike;
  logger: Logger;
  metrics: MetricsRegistry;
  maxAttempts: number;
  backoffBase: number;
  unitMs: number;
  timeoutMs: number;
  defaultHeaders?: Record<string, string>;
  /** Off by default: league routes signal a missing session with a 3xx. */
  followRedirects?: boolean;
  sleep?: (ms: number) => Promise<void>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRetriableStatus(status: number): boolean {
  return status >= 500;
}

class RetriableStatusError extends Error {}

async function toHttpResult(url: string, response: ResponseLike): Promise<HttpResult> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });
  return {
    url,
    status: response.status,
    contentType: response.headers.get("content-type") ?? "",
    headers,
    body: await response.text(),
  };
}

/**
 * Sequential GET client. Transport failures and 5xx answers are retried with
 * `unitMs * backoffBase^n` waits; every other status goes back to the caller.
 */
export class RetryClient {
  private readonly options: RetryClientOptions;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RetryClientOptions) {
    this.options = options;
    this.sleep = options.sleep ?? sleep;
  }

  async get(baseUrl: string, request: RequestOptions = {}): Promise<HttpResult> {
    const { logger, metrics, maxAttempts } = this.options;
    const params = request.params ?? {};
    const url = buildUrl(baseUrl, params);
    const headers = { ...(this.options.defaultHeaders ?? {}), ...(request.headers ?? {}) };
    let lastError = "no attempt made";

    for (let attempt = 1; attempt <= Math.max(1, maxAttempts); attempt += 1) {
      const stopTimer = metrics.startTimer("request_ms");
      metrics.incrementCounter("requests_sent");
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

      try {
        const response = await this.options.fetchFn(url, {
          method: "GET",
          headers,
          redirect: this.options.followRedirects ? "follow" : "manual",
          signal: controller.signal,
        });
        const result = await toHttpResult(url, response);
        if (!isRetriableStatus(result.status)) {
          logger.debug("http_request_complete", { url, attempt, status: result.status, durationMs: stopTimer() });
          return result;
        }
        throw new RetriableStatusError(`${result.status} server error`);
      } catch (error) {
        lastError = errorMessage(error);
        logger.warn("http_request_failed", { url, attempt, durationMs: stopTimer(), error: lastError });
      } finally {
        clearTimeout(timeout);
      }

      if (attempt < maxAttempts) {
        metrics.incrementCounter("requests_retried");
        await this.sleep(this.options.unitMs * this.options.backoffBase ** (attempt - 1));
      }
    }

    throw new FetchExhaustedError(baseUrl, params, Math.max(1, maxAttempts), lastError);
  }
}
