/**
 * Input file discovery and batched reading
 */

import type { Dirent } from 'node:fs';
import { readdir, readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { describeError, InputDirectoryError } from '@deadline-lens/shared';

export type ReadOutcome =
  | { filePath: string; ok: true; content: string }
  | { filePath: string; ok: false; reason: string };

function byName(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Whether a directory entry names a file. Symbolic links are followed; a
 * dangling link is kept so that reading it reports the failure.
 */
async function isFileEntry(directory: string, entry: Dirent): Promise<boolean> {
  if (entry.isFile()) {
    return true;
  }
  if (!entry.isSymbolicLink()) {
    return false;
  }

  try {
    return (await stat(join(directory, entry.name))).isFile();
  } catch {
    return true;
  }
}

/**
 * Files in `directory` (symlinks followed) whose names end in one of
 * `extensions` (case-insensitive), as full paths sorted by name
 */
export async function discoverFiles(
  directory: string,
  extensions: readonly string[]
): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(directory, { withFileTypes: true });
  } catch (error) {
    throw new InputDirectoryError(directory, describeError(error));
  }

  const suffixes = extensions.map((ext) => ext.toLowerCase());
  const candidates = entries.filter((entry) =>
    suffixes.some((suffix) => entry.name.toLowerCase().endsWith(suffix))
  );
  const kept = await Promise.all(candidates.map((entry) => isFileEntry(directory, entry)));

  return candidates
    .filter((_, index) => kept[index] === true)
    .map((entry) => entry.name)
    .sort(byName)
    .map((name) => join(directory, name));
}

/**
 * Read files `concurrency` at a time, yielding each batch once it is read.
 * Outcomes keep the order of `paths`; a read failure becomes a failed
 * outcome instead of a rejection.
 */
export async function* readFileBatches(
  paths: readonly string[],
  concurrency: number
): AsyncGenerator<ReadOutcome[]> {
  const batchSize = Math.max(1, Math.floor(concurrency));

  for (let i = 0; i < paths.length; i += batchSize) {
    const batch = paths.slice(i, i + batchSize);
    yield await Promise.all(
      batch.map(async (filePath): Promise<ReadOutcome> => {
        try {
          const content = await readFile(filePath, 'utf-8');
          return { filePath, ok: true, content };
        } catch (error) {
          return { filePath, ok: false, reason: describeError(error) };
        }
      })
    );
  }
}
