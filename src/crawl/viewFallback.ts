import type { z } from "zod";
import { errorMessage } from "../core/errors";
import type { QueryParams } from "../core/fetch";
import { isJsonObject, parseJsonResponse, unwrapSingle, type JsonObject } from "../core/payload";
import type { HttpResult, RetryClient } from "../core/retryClient";
import type { Logger, MetricsRegistry } from "../observability";
import { writeJsonAtomic } from "../store/atomicWriter";

const DEBUG_BODY_CHARS = 2000;

export interface EndpointShape {
  readonly name: string;
  readonly url: string;
  readonly params: QueryParams;
}

export interface FetchAttemptDescriptor {
  readonly endpoint: EndpointShape;
  readonly views: readonly string[];
  readonly filter?: JsonObject;
  readonly params?: QueryParams;
}

export type FailureReason =
  | "transport"
  | "redirect"
  | "http_status"
  | "content_type"
  | "unparseable"
  | "invalid_payload";

export interface FailedAttempt {
  descriptor: FetchAttemptDescriptor;
  reason: FailureReason;
  detail: string;
  status?: number;
}

export type FallbackResult<T> =
  | {
      kind: "matched";
      descriptor: FetchAttemptDescriptor;
      view: string;
      payload: T;
      failures: FailedAttempt[];
    }
  | {
      kind: "exhausted";
      failures: FailedAttempt[];
    };

export interface FallbackDeps {
  client: RetryClient;
  logger: Logger;
  metrics: MetricsRegistry;
  debugPath: string;
}

export interface FallbackRequest<T> {
  resource: string;
  descriptors: readonly FetchAttemptDescriptor[];
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  headers?: Record<string, string>;
}

interface LastAttempt {
  url: string;
  params: QueryParams;
  result?: HttpResult;
  payload?: unknown;
  error?: string;
}

export function viewLabel(descriptor: FetchAttemptDescriptor): string {
  return descriptor.views.join(",");
}

export function descriptorParams(descriptor: FetchAttemptDescriptor): QueryParams {
  const view = descriptor.views.length === 1 ? descriptor.views[0] : descriptor.views;
  return { ...descriptor.endpoint.params, view, ...(descriptor.params ?? {}) };
}

/**
 * Cross product in precedence order: endpoint shape, then view set, then
 * filter. The list is frozen so callers cannot reorder it mid-scan.
 */
export function enumerateDescriptors(
  endpoints: readonly EndpointShape[],
  viewSets: readonly (readonly string[])[],
  filters: readonly (JsonObject | undefined)[] = [undefined],
  params?: QueryParams,
): readonly FetchAttemptDescriptor[] {
  const descriptors: FetchAttemptDescriptor[] = [];
  for (const endpoint of endpoints) {
    for (const views of viewSets) {
      for (const filter of filters) {
        descriptors.push(Object.freeze({ endpoint, views: Object.freeze([...views]), filter, params }));
      }
    }
  }
  return Object.freeze(descriptors);
}

function buildDebugSnapshot(last: LastAttempt): JsonObject {
  return {
    url: last.url,
    params: last.params,
    status: last.result?.status ?? null,
    headers: last.result?.headers ?? {},
    body: (last.result?.body ?? "").slice(0, DEBUG_BODY_CHARS),
    payload_keys: isJsonObject(last.payload) ? Object.keys(last.payload) : null,
    error: last.error ?? null,
  };
}

export async function fetchWithFallback<T>(deps: FallbackDeps, request: FallbackRequest<T>): Promise<FallbackResult<T>> {
  const { client, logger, metrics } = deps;
  const failures: FailedAttempt[] = [];
  let last: LastAttempt | undefined;

  for (const descriptor of request.descriptors) {
    const params = descriptorParams(descriptor);
    const headers = { ...(request.headers ?? {}) };
    if (descriptor.filter) {
      headers["X-Fantasy-Filter"] = JSON.stringify(descriptor.filter);
    }

    const fail = (reason: FailureReason, detail: string, status?: number): void => {
      failures.push({ descriptor, reason, detail, status });
      metrics.incrementCounter("descriptors_failed");
      logger.info("fallback_descriptor_failed", {
        resource: request.resource,
        endpoint: descriptor.endpoint.name,
        view: viewLabel(descriptor),
        filtered: Boolean(descriptor.filter),
        reason,
        detail,
      });
    };

    let result: HttpResult;
    try {
      result = await client.get(descriptor.endpoint.url, { params, headers });
    } catch (error) {
      last = { url: descriptor.endpoint.url, params, error: errorMessage(error) };
      fail("transport", errorMessage(error));
      continue;
    }

    const parsed = parseJsonResponse(result);
    if (!parsed.ok) {
      last = { url: descriptor.endpoint.url, params, result };
      fail(parsed.reason, parsed.detail, result.status);
      continue;
    }

    const payload = unwrapSingle(parsed.payload);
    last = { url: descriptor.endpoint.url, params, result, payload };
    const validated = request.schema.safeParse(payload);
    if (!validated.success) {
      fail("invalid_payload", validated.error.issues[0]?.message ?? "payload rejected", result.status);
      continue;
    }

    logger.debug("fallback_descriptor_matched", {
      resource: request.resource,
      endpoint: descriptor.endpoint.name,
      view: viewLabel(descriptor),
      failedBefore: failures.length,
    });
    return { kind: "matched", descriptor, view: viewLabel(descriptor), payload: validated.data, failures };
  }

  if (last) {
    await writeJsonAtomic(deps.debugPath, buildDebugSnapshot(last), { pretty: true });
    logger.warn("fallback_exhausted", {
      resource: request.resource,
      attempts: failures.length,
      debugPath: deps.debugPath,
    });
  }
  return { kind: "exhausted", failures };
}
