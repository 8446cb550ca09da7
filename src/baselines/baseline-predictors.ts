/**
 * Reference predictors used when no real tool predictions are supplied.
 *
 * Both are deliberately uninformative about pathogenicity: a seeded uniform
 * random score, and a smooth function of position. A real tool that cannot
 * beat them is not adding signal.
 */
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import {
  readDelimitedTable,
  resolveKeyShape,
  variantKeyFromRow,
} from '../ingest/delimited-table.js';
import { formatLongTable } from '../ingest/wide-table.js';
import { EmptyDatasetError } from '../errors/benchmark-errors.js';
import { mulberry32 } from '../metrics/bootstrap.js';
import { canonicalForm } from '../variants/variant-key.js';
import type { PredictionRecord, VariantKey } from '../types/variant.js';

export const RANDOM_BASELINE = 'random_baseline';
export const POSITION_SINE_BASELINE = 'pos_sine_baseline';

/**
 * Read the distinct variants of a table in first-seen order.
 *
 * Any table with key columns works, including a label file.
 */
export async function loadVariantTable(path: string): Promise<VariantKey[]> {
  const table = await readDelimitedTable(path);
  const shape = resolveKeyShape(table);
  const seen = new Set<string>();
  const variants: VariantKey[] = [];

  for (const row of table.rows) {
    const variant = variantKeyFromRow(table, row, shape);
    const id = canonicalForm(variant);
    if (seen.has(id)) continue;
    seen.add(id);
    variants.push(variant);
  }

  if (variants.length === 0) {
    throw new EmptyDatasetError(`${path}: variant table has zero rows`);
  }
  return variants;
}

/**
 * Uniform scores in [0,1) from mulberry32, one draw per variant in order.
 */
export function randomBaseline(variants: readonly VariantKey[], seed = 42): PredictionRecord[] {
  const rng = mulberry32(seed);
  return variants.map((variant) => ({ variant, tool: RANDOM_BASELINE, score: rng() }));
}

/**
 * `(sin(pos / 1000) + 1) / 2`, always within [0,1].
 */
export function positionSineBaseline(variants: readonly VariantKey[]): PredictionRecord[] {
  return variants.map((variant) => ({
    variant,
    tool: POSITION_SINE_BASELINE,
    score: (Math.sin(variant.pos / 1000) + 1) / 2,
  }));
}

/**
 * Write one long-format prediction file per baseline into `outDir`.
 *
 * @returns The written paths, random baseline first
 */
export async function writeBaselineFiles(
  variants: readonly VariantKey[],
  outDir: string,
  seed = 42,
): Promise<string[]> {
  await mkdir(outDir, { recursive: true });
  const outputs: Array<[string, PredictionRecord[]]> = [
    [RANDOM_BASELINE, randomBaseline(variants, seed)],
    [POSITION_SINE_BASELINE, positionSineBaseline(variants)],
  ];

  const paths: string[] = [];
  for (const [tool, records] of outputs) {
    const path = join(outDir, `${tool}.tsv`);
    await writeFile(path, formatLongTable(records), 'utf-8');
    paths.push(path);
  }
  return paths;
}
