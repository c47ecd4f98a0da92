import { readdir, rm, stat } from "node:fs/promises";
import path from "node:path";

export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

/**
 * Delete regular files in `directory` whose modification time is older than `maxAgeMs`.
 *
 * Files that disappear between listing and deletion are skipped. A missing directory
 * counts as empty.
 *
 * @returns Names of the files removed
 */
export async function sweepStaleFiles(input: {
  directory: string;
  maxAgeMs: number;
  now: Date;
  matches?: (name: string) => boolean;
}): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(input.directory);
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return [];
    }
    throw error;
  }

  const cutoffMs = input.now.getTime() - input.maxAgeMs;
  const removed: string[] = [];
  for (const name of names) {
    if (input.matches && !input.matches(name)) {
      continue;
    }

    const filePath = path.join(input.directory, name);
    try {
      const stats = await stat(filePath);
      if (!stats.isFile() || stats.mtimeMs > cutoffMs) {
        continue;
      }
      await rm(filePath);
      removed.push(name);
    } catch (error) {
      if (!hasErrorCode(error, "ENOENT")) {
        throw error;
      }
    }
  }

  return removed;
}
