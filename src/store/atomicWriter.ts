import fs from "node:fs";
import path from "node:path";

export interface AtomicFs {
  mkdir(dirPath: string, options: { recursive: true }): Promise<unknown>;
  writeFile(filePath: string, data: string, encoding: "utf-8"): Promise<void>;
  rename(oldPath: string, newPath: string): Promise<void>;
}

export function tempPathFor(destination: string): string {
  return `${destination}.tmp`;
}

/**
 * Writes beside the destination, then renames over it. Readers see either the
 * previous file or the new one. The temp name is fixed per destination, so
 * two writers targeting the same path will race.
 */
export async function writeFileAtomic(destination: string, content: string, fsImpl: AtomicFs = fs.promises): Promise<void> {
  const tempPath = tempPathFor(destination);
  await fsImpl.mkdir(path.dirname(destination), { recursive: true });
  await fsImpl.writeFile(tempPath, content, "utf-8");
  await fsImpl.rename(tempPath, destination);
}

export async function writeJsonAtomic(
  destination: string,
  value: unknown,
  options: { pretty?: boolean; fsImpl?: AtomicFs } = {},
): Promise<void> {
  const content = options.pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value);
  await writeFileAtomic(destination, content, options.fsImpl);
}
