// Types
export type {
  VariantKey,
  BinaryLabel,
  PredictionRecord,
  LabelRecord,
  ScoredVariant,
} from './types/variant.js';

export type {
  AlignedPair,
  AlignedDataset,
  ToolCoverage,
  MetricName,
  ScoreDomain,
  ThresholdSource,
  ThresholdPolicy,
  ConfusionMatrix,
  ReliabilityBin,
  CalibrationStatus,
  Interval,
  ConfidenceIntervals,
  MetricsRecord,
  EvaluationErrorKind,
  EvaluationErrorRecord,
  EvaluationResult,
} from './types/evaluation.js';
export { METRIC_NAMES } from './types/evaluation.js';

// Variant keys
export * from './variants/index.js';

// Errors
export * from './errors/index.js';

// Configuration
export * from './config/index.js';

// Ingest
export * from './ingest/index.js';

// Alignment
export * from './alignment/index.js';

// Metrics
export * from './metrics/index.js';

// Evaluation entry points
export { evaluate, runEvaluation, compareMetricsRecords } from './evaluation/index.js';

// Reporting
export * from './reporting/index.js';

// Baselines
export * from './baselines/index.js';

// CLI helpers
export { discoverPredictionFiles } from './cli/discovery.js';
