/**
 * `variant-bench baselines`: write baseline prediction files for a variant set.
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { hasFlag, parseFlag, parseNumberFlag } from '../args.js';
import { loadVariantTable, writeBaselineFiles } from '../../baselines/index.js';

export function baselinesHelp(): string {
  return `
variant-bench baselines - Generate baseline predictor scores

Usage:
  variant-bench baselines --variants=<file> [options]

Options:
  --variants=<file>   Table with variant_id or chrom,pos,ref,alt columns
  --out=<dir>         Output directory (default: baselines)
  --seed=<n>          Seed of the random baseline (default: 42)
  --help, -h          Show this help

Writes random_baseline.tsv and pos_sine_baseline.tsv in the
variant_id/score/tool layout read by \`variant-bench evaluate\`.
`;
}

export async function baselinesCommand(args: string[]): Promise<number> {
  if (hasFlag(args, '--help', '-h')) {
    console.log(baselinesHelp());
    return 0;
  }

  const variantPath = parseFlag(args, 'variants');
  if (!variantPath) {
    p.log.error('Missing required --variants=<file>');
    console.log(baselinesHelp());
    return 1;
  }
  const outDir = parseFlag(args, 'out') ?? 'baselines';
  const seed = parseNumberFlag(args, 'seed') ?? 42;
  if (!Number.isInteger(seed) || seed < 0 || seed > 0xffffffff) {
    p.log.error(`--seed must be an integer in [0, ${0xffffffff}]`);
    return 1;
  }

  try {
    const variants = await loadVariantTable(variantPath);
    const paths = await writeBaselineFiles(variants, outDir, seed);
    p.log.success(`Scored ${variants.length} variant(s)`);
    for (const path of paths) {
      p.log.message(pc.dim(path));
    }
    return 0;
  } catch (err) {
    p.log.error(err instanceof Error ? err.message : String(err));
    return 1;
  }
}
