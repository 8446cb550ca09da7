/**
 * Evaluation entry points.
 *
 * `evaluate` is a pure function of already loaded stores; `runEvaluation`
 * loads the inputs from disk and delegates to it. Load-level problems throw,
 * per-tool problems come back in `errors`.
 *
 * @module evaluation/run-evaluation
 */

import { align } from '../alignment/aligner.js';
import { evaluateDataset } from '../metrics/metric-engine.js';
import { PredictionStore } from '../ingest/prediction-store.js';
import { LabelStore } from '../ingest/label-store.js';
import { resolveEvaluationConfig } from '../config/reader.js';
import { EmptyDatasetError } from '../errors/benchmark-errors.js';
import type { EvaluationConfigInput } from '../config/schema.js';
import type {
  EvaluationErrorRecord,
  EvaluationResult,
  MetricsRecord,
} from '../types/evaluation.js';

/**
 * Descending order with undefined (NaN) values last.
 */
function compareDescending(a: number, b: number): number {
  const aDefined = Number.isFinite(a);
  const bDefined = Number.isFinite(b);
  if (aDefined && bDefined) return b - a;
  if (aDefined) return -1;
  if (bDefined) return 1;
  return 0;
}

/**
 * Ranking used by the metrics table: AUROC, then AUPRC, then tool name.
 */
export function compareMetricsRecords(a: MetricsRecord, b: MetricsRecord): number {
  return (
    compareDescending(a.auroc, b.auroc) ||
    compareDescending(a.auprc, b.auprc) ||
    (a.tool < b.tool ? -1 : a.tool > b.tool ? 1 : 0)
  );
}

/**
 * Evaluate every tool in `predictions` against `labels`.
 *
 * @throws {EmptyDatasetError} When there are no prediction rows at all
 * @throws {ConfigError} When `config` fails validation
 */
export function evaluate(
  predictions: PredictionStore,
  labels: LabelStore,
  config: EvaluationConfigInput = {},
): EvaluationResult {
  const resolved = resolveEvaluationConfig(config);

  if (predictions.isEmpty) {
    const from = predictions.sources.length > 0 ? predictions.sources.join(', ') : 'predictions';
    throw new EmptyDatasetError(`${from}: no prediction rows to evaluate`);
  }

  const alignment = align(predictions, labels);
  const metrics: MetricsRecord[] = [];
  const errors: EvaluationErrorRecord[] = [...alignment.errors];

  for (const dataset of alignment.datasets.values()) {
    const { record, errors: toolErrors } = evaluateDataset(dataset, resolved);
    if (record) {
      metrics.push(record);
    }
    errors.push(...toolErrors);
  }

  metrics.sort(compareMetricsRecords);

  return {
    metrics,
    coverage: alignment.coverage,
    errors,
    nLabels: labels.size,
    config: resolved,
  };
}

/**
 * Load prediction and label files, then evaluate.
 *
 * @param predictionPaths - Explicit list of prediction files, read in order
 * @param labelPath - Truth label file
 * @throws {SchemaError} When any input file is malformed
 * @throws {EmptyDatasetError} When the labels or the predictions are empty
 */
export async function runEvaluation(
  predictionPaths: readonly string[],
  labelPath: string,
  config: EvaluationConfigInput = {},
): Promise<EvaluationResult> {
  const resolved = resolveEvaluationConfig(config);
  const labels = await LabelStore.load(labelPath);
  const predictions = await PredictionStore.load(predictionPaths);
  return evaluate(predictions, labels, resolved);
}
