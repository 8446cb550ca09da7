/**
 * `variant-bench split-wide`: turn a wide score table (one column per tool)
 * into one long-format prediction file per tool.
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { getNonFlagArgs, hasFlag, parseFlag } from '../args.js';
import { readDelimitedTable } from '../../ingest/delimited-table.js';
import { formatLongTable, splitWideTable } from '../../ingest/wide-table.js';

export function splitWideHelp(): string {
  return `
variant-bench split-wide - Split a wide score table into per-tool files

Usage:
  variant-bench split-wide <wide-file> [--out=<dir>]

The wide table has variant_id (or chrom,pos,ref,alt) plus one score column
per tool. Blank, NA, NaN, "." and null cells are skipped.

Options:
  --out=<dir>    Output directory (default: predictions)
  --help, -h     Show this help
`;
}

/**
 * File name for a tool's output: anything outside [A-Za-z0-9._-] becomes `_`.
 */
export function toolFileName(tool: string): string {
  return `${tool.replace(/[^A-Za-z0-9._-]/g, '_')}.tsv`;
}

/**
 * Tool pairs whose output files would overwrite each other. Names are
 * compared case-insensitively since some filesystems are.
 */
export function fileNameCollisions(tools: readonly string[]): Array<[string, string]> {
  const owners = new Map<string, string>();
  const collisions: Array<[string, string]> = [];
  for (const tool of tools) {
    const file = toolFileName(tool).toLowerCase();
    const owner = owners.get(file);
    if (owner === undefined) {
      owners.set(file, tool);
    } else {
      collisions.push([owner, tool]);
    }
  }
  return collisions;
}

export async function splitWideCommand(args: string[]): Promise<number> {
  if (hasFlag(args, '--help', '-h')) {
    console.log(splitWideHelp());
    return 0;
  }

  const [widePath] = getNonFlagArgs(args);
  if (!widePath) {
    p.log.error('Missing wide table path');
    console.log(splitWideHelp());
    return 1;
  }
  const outDir = parseFlag(args, 'out') ?? 'predictions';

  try {
    const byTool = splitWideTable(await readDelimitedTable(widePath));
    const scored = [...byTool].filter(([tool, records]) => {
      if (records.length === 0) p.log.warn(`${tool}: no scored variants, skipped`);
      return records.length > 0;
    });

    const collisions = fileNameCollisions(scored.map(([tool]) => tool));
    if (collisions.length > 0) {
      for (const [first, second] of collisions) {
        p.log.error(`Tools "${first}" and "${second}" both map to ${toolFileName(first)}`);
      }
      return 1;
    }

    await mkdir(outDir, { recursive: true });
    for (const [tool, records] of scored) {
      const path = join(outDir, toolFileName(tool));
      await writeFile(path, formatLongTable(records), 'utf-8');
      p.log.message(`${pc.cyan(tool)} ${pc.dim(`${records.length} row(s) -> ${path}`)}`);
    }
    return 0;
  } catch (err) {
    p.log.error(err instanceof Error ? err.message : String(err));
    return 1;
  }
}
