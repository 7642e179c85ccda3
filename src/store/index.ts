import type { AppConfig } from "../config";
import type { RunStore } from "./types";
import { SqliteStore } from "./sqliteStore";

export function createStore(config: AppConfig): RunStore {
  return new SqliteStore(config.storePath);
}

export { writeFileAtomic, writeJsonAtomic, tempPathFor } from "./atomicWriter";
export type { AtomicFs } from "./atomicWriter";
export { CrawlLog, CRAWL_LOG_COLUMNS, isTerminalStatus } from "./crawlLog";
export type { CrawlLogEntry, CrawlStatus } from "./crawlLog";
export { InMemoryStore } from "./memoryStore";
export { SqliteStore } from "./sqliteStore";
export * from "./types";
