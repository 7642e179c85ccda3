import fs from "node:fs";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { ConfigurationError } from "../core/errors";
import { writeFileAtomic } from "../store/atomicWriter";

export const ID_COLUMN = "espn_id";

const csvRowsSchema = z.array(z.array(z.string()));

/** Numeric ids from the `espn_id` column, in file order; anything else is skipped. */
export function parseIdQueue(content: string, source: string): number[] {
  const rows = csvRowsSchema.parse(
    parse(content, {
      skip_empty_lines: true,
      relax_column_count: true,
      bom: true,
    }),
  );
  const header = rows[0] ?? [];
  const column = header.findIndex((name) => name.trim() === ID_COLUMN);
  if (column < 0) {
    throw new ConfigurationError(`CSV missing ${ID_COLUMN} column: ${source}`);
  }

  const ids: number[] = [];
  for (const row of rows.slice(1)) {
    const value = (row[column] ?? "").trim();
    if (/^\d+$/.test(value)) {
      ids.push(Number.parseInt(value, 10));
    }
  }
  return ids;
}

export async function readIdQueue(csvPath: string): Promise<number[]> {
  const absolutePath = path.resolve(csvPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigurationError(`Identifier queue not found: ${absolutePath}`);
  }
  return parseIdQueue(await fs.promises.readFile(absolutePath, "utf-8"), absolutePath);
}

/** Applies `--start` / `--limit`; a limit of 0 takes everything after start. */
export function selectWindow(ids: readonly number[], start: number, limit: number): number[] {
  if (ids.length === 0) {
    throw new ConfigurationError("Identifier queue is empty.");
  }
  if (start < 0 || start >= ids.length) {
    throw new ConfigurationError(`--start out of range. ids=${ids.length} start=${start}`);
  }
  return limit > 0 ? ids.slice(start, start + limit) : ids.slice(start);
}

/** Rewrites any CSV carrying an `espn_id` column as a single-column queue. */
export async function writeIdQueue(sourcePath: string, destinationPath: string): Promise<number> {
  const ids = await readIdQueue(sourcePath);
  const rows = [[ID_COLUMN], ...ids.map((id) => [String(id)])];
  await writeFileAtomic(path.resolve(destinationPath), stringify(rows));
  return ids.length;
}
