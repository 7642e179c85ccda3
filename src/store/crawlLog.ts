import fs from "node:fs";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";

export type CrawlStatus = "ok" | "not-found" | "skip-existing" | "http-error" | "exception";

export interface CrawlLogEntry {
  espnId: number;
  status: CrawlStatus;
  httpStatus?: number;
  bytes?: number;
  path?: string;
  error?: string;
}

export const CRAWL_LOG_COLUMNS = ["espn_id", "status", "http_status", "bytes", "path", "error"] as const;

// "404" is how older logs spelled not-found
const TERMINAL_STATUSES = new Set(["ok", "not-found", "404"]);

const logRowSchema = z
  .object({
    espn_id: z.string().optional(),
    status: z.string().optional(),
  })
  .passthrough();

const logRowsSchema = z.array(logRowSchema);

export function isTerminalStatus(status: string): boolean {
  return TERMINAL_STATUSES.has(status.trim().toLowerCase());
}

/** Append-only CSV ledger of per-identifier fetch outcomes. */
export class CrawlLog {
  readonly logPath: string;

  constructor(logPath: string) {
    this.logPath = path.resolve(logPath);
  }

  async loadCompleted(): Promise<Set<number>> {
    const completed = new Set<number>();
    if (!fs.existsSync(this.logPath)) {
      return completed;
    }

    const content = await fs.promises.readFile(this.logPath, "utf-8");
    const rows = logRowsSchema.parse(
      parse(content, {
        columns: true,
        skip_empty_lines: true,
        relax_column_count: true,
        trim: true,
      }),
    );

    for (const row of rows) {
      const id = row.espn_id ?? "";
      if (/^\d+$/.test(id) && isTerminalStatus(row.status ?? "")) {
        completed.add(Number.parseInt(id, 10));
      }
    }
    return completed;
  }

  async append(entry: CrawlLogEntry): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.logPath), { recursive: true });
    const isNewLog = !fs.existsSync(this.logPath) || fs.statSync(this.logPath).size === 0;
    const rows: Array<Array<string | number>> = [];
    if (isNewLog) {
      rows.push([...CRAWL_LOG_COLUMNS]);
    }
    rows.push([
      entry.espnId,
      entry.status,
      entry.httpStatus ?? "",
      entry.bytes ?? "",
      entry.path ?? "",
      entry.error ?? "",
    ]);
    await fs.promises.appendFile(this.logPath, stringify(rows), "utf-8");
  }
}
