/**
 * Prediction file discovery.
 *
 * Directories are scanned once, non-recursively, for files with a supported
 * extension; the engine itself only ever sees the resulting explicit list.
 */
import { readdir, stat } from 'fs/promises';
import { extname, join, resolve } from 'path';
import { DELIMITERS } from '../ingest/delimited-table.js';

function isTabular(name: string): boolean {
  return Object.hasOwn(DELIMITERS, extname(name).toLowerCase());
}

/**
 * Expand files and directories into a sorted, duplicate-free file list.
 *
 * Directory entries are sorted by name; explicit files keep their position.
 *
 * @param inputs - Files or directories
 * @param exclude - Files to leave out (e.g. the label file sitting beside predictions)
 */
export async function discoverPredictionFiles(
  inputs: readonly string[],
  exclude: readonly string[] = [],
): Promise<string[]> {
  const excluded = new Set(exclude.map((p) => resolve(p)));
  const seen = new Set<string>();
  const files: string[] = [];

  const add = (path: string): void => {
    const key = resolve(path);
    if (excluded.has(key) || seen.has(key)) return;
    seen.add(key);
    files.push(path);
  };

  for (const input of inputs) {
    const info = await stat(input);
    if (!info.isDirectory()) {
      add(input);
      continue;
    }
    const entries = await readdir(input, { withFileTypes: true });
    const names = entries
      .filter((e) => e.isFile() && isTabular(e.name))
      .map((e) => e.name)
      .sort();
    for (const name of names) {
      add(join(input, name));
    }
  }

  return files;
}
