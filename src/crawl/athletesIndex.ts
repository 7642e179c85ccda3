import path from "node:path";
import { isJsonObject } from "../core/payload";
import { writeJsonAtomic } from "../store/atomicWriter";
import { paginate, type PaginationCandidate, type PaginationStrategy, type PaginatorDeps } from "./paginator";

export const INDEX_PAGINATION_CANDIDATES: readonly PaginationCandidate[] = Object.freeze([
  Object.freeze({ pageParam: "page", sizeParam: "limit" }),
  Object.freeze({ pageParam: "pageIndex", sizeParam: "pageSize" }),
]);

export interface AthletesIndexOptions {
  baseUrl: string;
  outputDir: string;
  pageSize: number;
  maxPages: number;
  resume: boolean;
}

export interface AthletesIndexSummary {
  count: number;
  named: number;
  pagesFetched: number;
  pagesReused: number;
  strategy: PaginationStrategy;
  indexPath: string;
  nameMapPath: string;
}

function nonEmptyString(value: unknown): string | undefined {
  if (typeof value === "string" && value.trim()) {
    return value.trim();
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

/** id -> display name; the first item seen for an id wins. */
export function buildNameMap(items: readonly unknown[]): Record<string, string> {
  const nameMap: Record<string, string> = {};
  for (const item of items) {
    if (!isJsonObject(item)) {
      continue;
    }
    const id = nonEmptyString(item.id);
    const display =
      nonEmptyString(item.displayName) ?? nonEmptyString(item.fullName) ?? nonEmptyString(item.shortName);
    if (id && display && !(id in nameMap)) {
      nameMap[id] = display;
    }
  }
  return nameMap;
}

export async function pullAthletesIndex(deps: PaginatorDeps, options: AthletesIndexOptions): Promise<AthletesIndexSummary> {
  const result = await paginate(deps, {
    baseUrl: options.baseUrl,
    candidates: INDEX_PAGINATION_CANDIDATES,
    pageSize: options.pageSize,
    pagesDir: path.join(options.outputDir, "pages"),
    artifactPrefix: "athletes_index",
    maxPages: options.maxPages,
    resume: options.resume,
  });

  const indexPath = path.join(options.outputDir, "athletes_index.json");
  const nameMapPath = path.join(options.outputDir, "espn_name_map.json");
  const nameMap = buildNameMap(result.items);

  await writeJsonAtomic(indexPath, {
    source: options.baseUrl,
    generated_at: new Date().toISOString(),
    strategy: result.strategy,
    count: result.items.length,
    items: result.items,
  });
  await writeJsonAtomic(nameMapPath, nameMap, { pretty: true });

  return {
    count: result.items.length,
    named: Object.keys(nameMap).length,
    pagesFetched: result.pagesFetched,
    pagesReused: result.pagesReused,
    strategy: result.strategy,
    indexPath,
    nameMapPath,
  };
}
