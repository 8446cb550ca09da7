/**
 * `variant-bench evaluate`: score prediction files against a label set and
 * write the report artifacts.
 *
 * Exit code 1 means nothing was evaluated (bad arguments or an input that
 * failed to load). Per-tool problems are reported but still exit 0.
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { join } from 'path';
import { getNonFlagArgs, hasFlag, parseFlag, parseNumberFlag, splitList } from '../args.js';
import { discoverPredictionFiles } from '../discovery.js';
import { DEFAULT_CONFIG_PATH, readEvaluationConfig, resolveEvaluationConfig } from '../../config/index.js';
import { runEvaluation } from '../../evaluation/index.js';
import { loadVariantTable, writeBaselineFiles } from '../../baselines/index.js';
import {
  buildProvenance,
  formatTerminalSummary,
  hashInput,
  serializeResult,
  writeReportArtifacts,
} from '../../reporting/index.js';
import type { EvaluationConfig } from '../../config/index.js';
import type { EvaluationResult } from '../../types/evaluation.js';

export function evaluateHelp(): string {
  return `
variant-bench evaluate - Benchmark variant effect predictors against truth labels

Usage:
  variant-bench evaluate --labels=<file> [options]

Options:
  --labels=<file>          Truth labels (variant_id or chrom,pos,ref,alt plus label)
  --predictions=<paths>    Comma-separated prediction files or directories
                           (directories are scanned for .tsv/.csv files)
  --variants=<file>        Variants for the baseline predictors used when no
                           prediction files are found (default: the label file)
  --out=<dir>              Output directory (default: results)
  --config=<file>          Config file (default: ${DEFAULT_CONFIG_PATH})
  --threshold=<n>          Operating threshold, overrides the config
  --seed=<n>               Random seed, overrides the config
  --json                   Print the result as JSON instead of a summary
  --help, -h               Show this help

Examples:
  variant-bench evaluate --labels=labels.tsv --predictions=predictions/
  variant-bench evaluate --labels=labels.tsv --predictions=a.tsv,b.csv --threshold=0.7
`;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Apply command-line overrides on top of the file config.
 */
function withOverrides(config: EvaluationConfig, args: string[]): EvaluationConfig {
  const threshold = parseNumberFlag(args, 'threshold');
  const seed = parseNumberFlag(args, 'seed');
  return resolveEvaluationConfig({
    ...config,
    ...(threshold !== undefined ? { threshold } : {}),
    ...(seed !== undefined ? { randomSeed: seed } : {}),
  });
}

/**
 * Resolve the prediction file list, generating baselines when it is empty.
 */
async function resolvePredictionPaths(
  args: string[],
  labelPath: string,
  outDir: string,
  config: EvaluationConfig,
  quiet: boolean,
): Promise<string[]> {
  const inputs = splitList(parseFlag(args, 'predictions'));
  const found = await discoverPredictionFiles(inputs, [labelPath]);
  if (found.length > 0) {
    if (!quiet) p.log.info(`Found ${found.length} prediction file(s)`);
    return found;
  }

  const variantPath = parseFlag(args, 'variants') ?? labelPath;
  const variants = await loadVariantTable(variantPath);
  const paths = await writeBaselineFiles(variants, join(outDir, 'baselines'), config.randomSeed);
  if (!quiet) {
    p.log.warn('No prediction files found; evaluating baseline predictors instead');
    p.log.message(pc.dim(`Baselines scored ${variants.length} variant(s) from ${variantPath}`));
  }
  return paths;
}

export async function evaluateCommand(args: string[]): Promise<number> {
  if (hasFlag(args, '--help', '-h') || getNonFlagArgs(args)[0] === 'help') {
    console.log(evaluateHelp());
    return 0;
  }

  const jsonMode = hasFlag(args, '--json');
  const labelPath = parseFlag(args, 'labels');
  if (!labelPath) {
    p.log.error('Missing required --labels=<file>');
    console.log(evaluateHelp());
    return 1;
  }
  const outDir = parseFlag(args, 'out') ?? 'results';

  if (!jsonMode) {
    p.intro(pc.bold('variant-bench evaluate'));
  }

  let config: EvaluationConfig;
  let predictionPaths: string[];
  try {
    config = withOverrides(
      await readEvaluationConfig(parseFlag(args, 'config') ?? DEFAULT_CONFIG_PATH),
      args,
    );
    predictionPaths = await resolvePredictionPaths(args, labelPath, outDir, config, jsonMode);
  } catch (err) {
    p.log.error(describeError(err));
    return 1;
  }

  const spinner = jsonMode ? null : p.spinner();
  spinner?.start('Evaluating predictions');

  let result: EvaluationResult;
  try {
    result = await runEvaluation(predictionPaths, labelPath, config);
  } catch (err) {
    spinner?.stop('Evaluation failed');
    p.log.error(describeError(err));
    return 1;
  }
  spinner?.stop(`Evaluated ${result.metrics.length} of ${result.coverage.size} tool(s)`);

  const inputs = [
    await hashInput('labels', labelPath),
    ...(await Promise.all(predictionPaths.map((path) => hashInput('predictions', path)))),
  ];
  const provenance = buildProvenance(inputs, result);
  const artifacts = await writeReportArtifacts(outDir, result, provenance);

  if (jsonMode) {
    console.log(serializeResult(result));
    return 0;
  }

  console.log(formatTerminalSummary(result));
  p.log.message(pc.dim(`Metrics table: ${artifacts.metricsTable}`));
  p.log.message(pc.dim(`Report:        ${artifacts.report}`));
  p.log.message(pc.dim(`Manifest:      ${artifacts.manifest}`));
  p.outro(result.errors.length > 0 ? pc.yellow(`Done with ${result.errors.length} error(s)`) : pc.green('Done'));
  return 0;
}
