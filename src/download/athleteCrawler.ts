import fs from "node:fs";
import path from "node:path";
import { errorMessage } from "../core/errors";
import { parseJson } from "../core/payload";
import type { RetryClient } from "../core/retryClient";
import type { Logger, MetricsRegistry } from "../observability";
import { writeJsonAtomic } from "../store/atomicWriter";
import type { CrawlLog, CrawlLogEntry } from "../store/crawlLog";

const EXISTING_MIN_BYTES = 50;
const ERROR_PREVIEW_CHARS = 200;

export interface CoreItemRecord {
  meta: {
    source: string;
    http_status: number;
    fetched_at: string;
  };
  data: unknown;
  raw: string | null;
}

export interface AthleteCrawlDeps {
  client: RetryClient;
  logger: Logger;
  metrics: MetricsRegistry;
  crawlLog: CrawlLog;
  delay?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => Date;
}

export interface AthleteCrawlOptions {
  baseUrl: string;
  outputDir: string;
  ids: readonly number[];
  resume: boolean;
  minDelayMs: number;
  maxDelayMs: number;
}

export interface AthleteCrawlSummary {
  requested: number;
  fetched: number;
  ok: number;
  notFound: number;
  httpErrors: number;
  exceptions: number;
  skippedCompleted: number;
  skippedExisting: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function jitteredDelay(minDelayMs: number, maxDelayMs: number, random: () => number = Math.random): number {
  const low = Math.min(minDelayMs, maxDelayMs);
  const high = Math.max(minDelayMs, maxDelayMs);
  return low + (high - low) * random();
}

export function itemUrl(baseUrl: string, espnId: number): string {
  return `${baseUrl.replace(/\/+$/, "")}/${espnId}`;
}

// Fetched-at stamps are second precision, matching earlier pulls.
function formatFetchedAt(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

export function buildCoreItemRecord(source: string, httpStatus: number, body: string, fetchedAt: Date): CoreItemRecord {
  const parsed = parseJson(body);
  return {
    meta: {
      source,
      http_status: httpStatus,
      fetched_at: formatFetchedAt(fetchedAt),
    },
    data: parsed.ok ? parsed.value : null,
    raw: parsed.ok ? null : body,
  };
}

function existingOutputSize(outputPath: string): number | undefined {
  if (!fs.existsSync(outputPath)) {
    return undefined;
  }
  const size = fs.statSync(outputPath).size;
  return size > EXISTING_MIN_BYTES ? size : undefined;
}

async function fetchOne(
  deps: AthleteCrawlDeps,
  options: AthleteCrawlOptions,
  espnId: number,
  outputPath: string,
): Promise<CrawlLogEntry> {
  const url = itemUrl(options.baseUrl, espnId);
  try {
    const result = await deps.client.get(url);
    if (result.status === 200 && result.body.trim()) {
      const record = buildCoreItemRecord(url, result.status, result.body, (deps.now ?? (() => new Date()))());
      await writeJsonAtomic(outputPath, record);
      return { espnId, status: "ok", httpStatus: result.status, bytes: fs.statSync(outputPath).size, path: outputPath };
    }
    const bytes = Buffer.byteLength(result.body, "utf-8");
    if (result.status === 404) {
      return { espnId, status: "not-found", httpStatus: 404, bytes };
    }
    return {
      espnId,
      status: "http-error",
      httpStatus: result.status,
      bytes,
      error: result.body.slice(0, ERROR_PREVIEW_CHARS).replace(/\n/g, " "),
    };
  } catch (error) {
    return { espnId, status: "exception", error: errorMessage(error) };
  }
}

/**
 * Best-effort crawl of one record per identifier. Completed ids from earlier
 * runs are skipped without a request; every other outcome lands in the crawl
 * log, and a failing id never stops the run.
 */
export async function crawlAthletesById(deps: AthleteCrawlDeps, options: AthleteCrawlOptions): Promise<AthleteCrawlSummary> {
  const { crawlLog, logger, metrics } = deps;
  const delay = deps.delay ?? sleep;
  const outputDir = path.resolve(options.outputDir);
  await fs.promises.mkdir(outputDir, { recursive: true });

  const completed = options.resume ? await crawlLog.loadCompleted() : new Set<number>();
  logger.info("athletes_crawl_start", { ids: options.ids.length, completed: completed.size, resume: options.resume });

  const summary: AthleteCrawlSummary = {
    requested: options.ids.length,
    fetched: 0,
    ok: 0,
    notFound: 0,
    httpErrors: 0,
    exceptions: 0,
    skippedCompleted: 0,
    skippedExisting: 0,
  };

  for (const espnId of options.ids) {
    if (completed.has(espnId)) {
      summary.skippedCompleted += 1;
      continue;
    }

    const outputPath = path.join(outputDir, `${espnId}.json`);
    const existingBytes = existingOutputSize(outputPath);
    if (existingBytes !== undefined) {
      await crawlLog.append({ espnId, status: "skip-existing", bytes: existingBytes, path: outputPath });
      metrics.incrementCounter("items_skipped");
      summary.skippedExisting += 1;
      continue;
    }

    const entry = await fetchOne(deps, options, espnId, outputPath);
    await crawlLog.append(entry);
    summary.fetched += 1;

    switch (entry.status) {
      case "ok":
        metrics.incrementCounter("items_ok");
        summary.ok += 1;
        logger.debug("athlete_item_ok", { espnId, bytes: entry.bytes });
        break;
      case "not-found":
        metrics.incrementCounter("items_not_found");
        summary.notFound += 1;
        logger.debug("athlete_item_not_found", { espnId });
        break;
      case "http-error":
        metrics.incrementCounter("items_failed");
        summary.httpErrors += 1;
        logger.warn("athlete_item_http_error", { espnId, status: entry.httpStatus });
        break;
      default:
        metrics.incrementCounter("items_failed");
        summary.exceptions += 1;
        logger.warn("athlete_item_exception", { espnId, error: entry.error });
    }

    await delay(jitteredDelay(options.minDelayMs, options.maxDelayMs, deps.random));
  }

  logger.info("athletes_crawl_complete", { ...summary, logPath: crawlLog.logPath });
  return summary;
}
