import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { errorMessage, StructuralResponseError } from "../core/errors";
import { parseJson } from "../core/payload";
import type { RetryClient } from "../core/retryClient";
import type { Logger, MetricsRegistry } from "../observability";
import { writeJsonAtomic } from "../store/atomicWriter";

export interface PaginationCandidate {
  readonly pageParam: string;
  readonly sizeParam: string;
}

export type PaginationStrategy =
  | {
      readonly kind: "paged";
      readonly pageParam: string;
      readonly sizeParam: string;
      readonly pageCount?: number;
    }
  | {
      readonly kind: "single";
      readonly sizeParam: string;
    };

export interface PageAccumulator {
  readonly items: readonly unknown[];
  readonly pages: number;
  readonly reused: number;
}

export interface PaginatorDeps {
  client: RetryClient;
  logger: Logger;
  metrics: MetricsRegistry;
}

export interface PaginateOptions {
  baseUrl: string;
  candidates: readonly PaginationCandidate[];
  pageSize: number;
  pagesDir: string;
  artifactPrefix: string;
  /** 0 or undefined means no cap beyond the server's page count. */
  maxPages?: number;
  resume: boolean;
  fallbackSizeParam?: string;
}

export interface PaginationResult {
  strategy: PaginationStrategy;
  items: unknown[];
  pagesFetched: number;
  pagesReused: number;
  probes: number;
}

const pageNumberSchema = z.union([z.number().int(), z.string().regex(/^\d+$/).transform(Number)]);

// A probe only counts when the server echoes a page index next to items[].
const probeEnvelopeSchema = z
  .object({
    items: z.array(z.unknown()),
    pageIndex: pageNumberSchema,
    pageCount: pageNumberSchema.optional(),
  })
  .passthrough();

const pageEnvelopeSchema = z
  .object({
    items: z.array(z.unknown()).optional(),
    pageIndex: pageNumberSchema.optional(),
  })
  .passthrough();

export const EMPTY_ACCUMULATOR: PageAccumulator = { items: [], pages: 0, reused: 0 };

export function appendPage(acc: PageAccumulator, items: readonly unknown[], reused: boolean): PageAccumulator {
  return {
    items: [...acc.items, ...items],
    pages: acc.pages + 1,
    reused: acc.reused + (reused ? 1 : 0),
  };
}

export function pageArtifactPath(pagesDir: string, prefix: string, pageIndex: number): string {
  return path.join(pagesDir, `${prefix}_${String(pageIndex).padStart(4, "0")}.json`);
}

function pageLimit(strategy: PaginationStrategy, maxPages?: number): number {
  if (strategy.kind === "single") {
    return 1;
  }
  const cap = maxPages && maxPages > 0 ? maxPages : Number.POSITIVE_INFINITY;
  return Math.min(strategy.pageCount ?? Number.POSITIVE_INFINITY, cap);
}

async function fetchPagePayload(deps: PaginatorDeps, baseUrl: string, params: Record<string, number>): Promise<unknown> {
  const result = await deps.client.get(baseUrl, { params });
  if (result.status < 200 || result.status >= 300) {
    throw new StructuralResponseError(`HTTP ${result.status} from ${result.url}`);
  }
  const parsed = parseJson(result.body);
  if (!parsed.ok) {
    throw new StructuralResponseError(`Unparseable page from ${result.url}: ${parsed.error}`);
  }
  return parsed.value;
}

async function probeCandidates(
  deps: PaginatorDeps,
  options: PaginateOptions,
): Promise<{ strategy: PaginationStrategy; payload: unknown; pageIndex: number; probes: number } | { probes: number }> {
  let probes = 0;
  for (const candidate of options.candidates) {
    probes += 1;
    try {
      const payload = await fetchPagePayload(deps, options.baseUrl, {
        [candidate.pageParam]: 1,
        [candidate.sizeParam]: options.pageSize,
      });
      const envelope = probeEnvelopeSchema.safeParse(payload);
      if (envelope.success) {
        const strategy: PaginationStrategy = Object.freeze({
          kind: "paged",
          pageParam: candidate.pageParam,
          sizeParam: candidate.sizeParam,
          pageCount: envelope.data.pageCount,
        });
        deps.logger.info("pagination_strategy_selected", { url: options.baseUrl, ...candidate, probes });
        return { strategy, payload, pageIndex: envelope.data.pageIndex, probes };
      }
      deps.logger.info("pagination_probe_mismatch", { url: options.baseUrl, ...candidate });
    } catch (error) {
      deps.logger.warn("pagination_probe_failed", { url: options.baseUrl, ...candidate, error: errorMessage(error) });
    }
  }
  return { probes };
}

/**
 * Finds the paging convention the endpoint honours, then walks pages until the
 * reported page count, the page cap, or an empty page. Every page is stored
 * verbatim so the aggregate can be rebuilt offline.
 */
export async function paginate(deps: PaginatorDeps, options: PaginateOptions): Promise<PaginationResult> {
  const { logger, metrics } = deps;
  const artifactFor = (pageIndex: number) => pageArtifactPath(options.pagesDir, options.artifactPrefix, pageIndex);
  const probe = await probeCandidates(deps, options);

  let strategy: PaginationStrategy;
  let acc: PageAccumulator;
  let nextIndex: number;
  let ended = false;

  if ("strategy" in probe) {
    strategy = probe.strategy;
    await writeJsonAtomic(artifactFor(probe.pageIndex), probe.payload);
    metrics.incrementCounter("pages_fetched");
    const firstItems = probeEnvelopeSchema.parse(probe.payload).items;
    acc = appendPage(EMPTY_ACCUMULATOR, firstItems, false);
    nextIndex = Math.max(probe.pageIndex + 1, 2);
    if (firstItems.length === 0) {
      logger.info("pagination_empty_page", { url: options.baseUrl, pageIndex: probe.pageIndex });
      ended = true;
    }
  } else {
    const sizeParam = options.fallbackSizeParam ?? "limit";
    strategy = Object.freeze({ kind: "single", sizeParam });
    logger.warn("pagination_no_convention_matched", { url: options.baseUrl, probes: probe.probes });
    const payload = await fetchPagePayload(deps, options.baseUrl, { [sizeParam]: options.pageSize });
    await writeJsonAtomic(artifactFor(1), payload);
    metrics.incrementCounter("pages_fetched");
    const items = pageEnvelopeSchema.safeParse(payload);
    if (!items.success || !items.data.items || items.data.items.length === 0) {
      throw new StructuralResponseError(`No items[] found at ${options.baseUrl}. Check ${options.pagesDir}.`);
    }
    acc = appendPage(EMPTY_ACCUMULATOR, items.data.items, false);
    nextIndex = 2;
  }

  const limit = ended ? acc.pages : pageLimit(strategy, options.maxPages);
  while (strategy.kind === "paged" && acc.pages < limit) {
    const artifactPath = artifactFor(nextIndex);
    let payload: unknown;
    let reused = false;

    if (options.resume && fs.existsSync(artifactPath)) {
      const stored = parseJson(await fs.promises.readFile(artifactPath, "utf-8"));
      if (!stored.ok) {
        throw new StructuralResponseError(`Corrupt page artifact ${artifactPath}: ${stored.error}`);
      }
      payload = stored.value;
      reused = true;
      metrics.incrementCounter("pages_reused");
    } else {
      payload = await fetchPagePayload(deps, options.baseUrl, {
        [strategy.pageParam]: nextIndex,
        [strategy.sizeParam]: options.pageSize,
      });
      await writeJsonAtomic(artifactPath, payload);
      metrics.incrementCounter("pages_fetched");
    }

    const page = pageEnvelopeSchema.safeParse(payload);
    const items = page.success ? page.data.items ?? [] : [];
    if (items.length === 0) {
      logger.info("pagination_empty_page", { url: options.baseUrl, pageIndex: nextIndex });
      break;
    }

    acc = appendPage(acc, items, reused);
    logger.info("pagination_page_complete", { url: options.baseUrl, pageIndex: nextIndex, items: items.length, reused });
    const serverIndex = page.success ? page.data.pageIndex : undefined;
    // trust the server's index, but never step backwards
    nextIndex = serverIndex !== undefined && serverIndex >= nextIndex ? serverIndex + 1 : nextIndex + 1;
  }

  return {
    strategy,
    items: [...acc.items],
    pagesFetched: acc.pages - acc.reused,
    pagesReused: acc.reused,
    probes: probe.probes,
  };
}
