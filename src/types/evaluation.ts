/**
 * Types for aligned datasets, metric records and evaluation results.
 *
 * Undefined metrics are represented as `NaN` (never 0), and confidence
 * intervals carry an explicit status so that "not computed" can never be
 * confused with "computed and wide".
 */

import type { BinaryLabel } from './variant.js';
import type { EvaluationConfig } from '../config/types.js';

// ============================================================================
// Alignment
// ============================================================================

/**
 * One matched observation after the prediction/label join.
 */
export interface AlignedPair {
  /** Canonical variant id (`chrom:pos:ref:alt`) */
  variantId: string;
  score: number;
  label: BinaryLabel;
}

/**
 * Per-tool join result, in label load order.
 */
export interface AlignedDataset {
  tool: string;
  pairs: readonly AlignedPair[];
}

/**
 * Coverage of a tool against the label set.
 */
export interface ToolCoverage {
  /** Distinct variants the tool scored */
  nScored: number;
  /** Distinct labeled variants */
  nLabeled: number;
  /** Variants present in both */
  nMatched: number;
}

// ============================================================================
// Metrics
// ============================================================================

/**
 * Metrics that can carry a bootstrap confidence interval.
 */
export const METRIC_NAMES = [
  'auroc',
  'auprc',
  'brier',
  'sensitivity',
  'specificity',
  'ppv',
  'npv',
  'f1',
  'mcc',
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

/**
 * Whether a tool's scores are treated as probabilities.
 * - 'probability': scores must lie in [0,1]; Brier and reliability are computed
 * - 'unbounded': calibration metrics are not applicable
 */
export type ScoreDomain = 'probability' | 'unbounded';

/**
 * Where the operating threshold for a tool came from.
 */
export type ThresholdSource = 'default' | 'configured' | 'tool';

export interface ThresholdPolicy {
  value: number;
  source: ThresholdSource;
}

export interface ConfusionMatrix {
  tp: number;
  fp: number;
  tn: number;
  fn: number;
}

/**
 * One equal-width reliability bin over [0,1].
 */
export interface ReliabilityBin {
  bin: number;
  lower: number;
  upper: number;
  /** Members in the bin; 0 marks an empty bin */
  n: number;
  /** Mean predicted score, NaN when empty */
  meanScore: number;
  /** Observed positive rate, NaN when empty */
  observedRate: number;
}

export type CalibrationStatus = 'computed' | 'not_applicable' | 'domain_error';

export interface Interval {
  low: number;
  high: number;
}

/**
 * Bootstrap confidence intervals for a tool.
 *
 * `intervals` holds only metrics that were defined at the point estimate and
 * in at least one draw.
 */
export type ConfidenceIntervals =
  | {
      status: 'computed';
      level: number;
      draws: number;
      seed: number;
      intervals: Partial<Record<MetricName, Interval>>;
      /** Draws in which a metric was undefined and skipped */
      skippedDraws: Partial<Record<MetricName, number>>;
    }
  | {
      status: 'not_computed';
      reason: string;
    };

/**
 * Full metric record for one tool.
 */
export interface MetricsRecord {
  tool: string;
  n: number;
  nPositive: number;
  nNegative: number;
  auroc: number;
  auprc: number;
  brier: number;
  sensitivity: number;
  specificity: number;
  ppv: number;
  npv: number;
  f1: number;
  mcc: number;
  confusion: ConfusionMatrix;
  threshold: ThresholdPolicy;
  scoreDomain: ScoreDomain;
  calibrationStatus: CalibrationStatus;
  /** null when calibration is not computed */
  reliability: ReliabilityBin[] | null;
  /** Metrics reported as NaN because they are undefined for this dataset */
  undefinedMetrics: MetricName[];
  ci: ConfidenceIntervals;
}

// ============================================================================
// Evaluation result
// ============================================================================

export type EvaluationErrorKind =
  | 'NoOverlapError'
  | 'UndefinedMetricError'
  | 'CalibrationDomainError';

/**
 * A per-tool problem that did not abort the run.
 */
export interface EvaluationErrorRecord {
  tool: string;
  kind: EvaluationErrorKind;
  message: string;
}

export interface EvaluationResult {
  /** Sorted by AUROC desc, then AUPRC desc; undefined values last */
  metrics: MetricsRecord[];
  /** Every tool seen in the predictions, in first-seen order */
  coverage: Map<string, ToolCoverage>;
  errors: EvaluationErrorRecord[];
  /** Number of labeled variants */
  nLabels: number;
  /** Fully resolved config the run used */
  config: EvaluationConfig;
}
