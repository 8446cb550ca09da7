/**
 * Inner join of tool predictions against truth labels.
 *
 * The join walks labels in their load order and emits a pair for every
 * labeled variant the tool scored, so the pair order of an AlignedDataset is
 * fully determined by the label file. Bootstrap draws index into that order.
 */
import { NoOverlapError } from '../errors/benchmark-errors.js';
import type { PredictionStore } from '../ingest/prediction-store.js';
import type { LabelStore } from '../ingest/label-store.js';
import type {
  AlignedDataset,
  AlignedPair,
  EvaluationErrorRecord,
  ToolCoverage,
} from '../types/evaluation.js';

export interface AlignmentResult {
  /** Every tool, including those with zero matches (empty pairs) */
  datasets: Map<string, AlignedDataset>;
  coverage: Map<string, ToolCoverage>;
  /** One NoOverlapError record per tool with zero matches */
  errors: EvaluationErrorRecord[];
}

/**
 * Join one tool's scores against the labels.
 */
export function alignTool(
  tool: string,
  predictions: PredictionStore,
  labels: LabelStore,
): AlignedDataset {
  const scores = predictions.scoresFor(tool);
  const pairs: AlignedPair[] = [];
  for (const [variantId, { label }] of labels.entries()) {
    const scored = scores.get(variantId);
    if (scored) {
      pairs.push({ variantId, score: scored.score, label });
    }
  }
  return { tool, pairs };
}

/**
 * Join every tool and report coverage.
 */
export function align(predictions: PredictionStore, labels: LabelStore): AlignmentResult {
  const datasets = new Map<string, AlignedDataset>();
  const coverage = new Map<string, ToolCoverage>();
  const errors: EvaluationErrorRecord[] = [];

  for (const tool of predictions.tools()) {
    const dataset = alignTool(tool, predictions, labels);
    const nScored = predictions.scoresFor(tool).size;

    datasets.set(tool, dataset);
    coverage.set(tool, {
      nScored,
      nLabeled: labels.size,
      nMatched: dataset.pairs.length,
    });

    if (dataset.pairs.length === 0) {
      errors.push(
        new NoOverlapError(
          tool,
          `none of ${nScored} scored variant(s) appear among ${labels.size} labeled variant(s)`,
        ).toRecord(),
      );
    }
  }

  return { datasets, coverage, errors };
}
