/**
 * Per-tool metric computation.
 *
 * Turns one AlignedDataset into a MetricsRecord plus the per-tool errors
 * raised while computing it. Nothing here throws for data-dependent reasons:
 * undefined metrics become NaN, are listed in `undefinedMetrics`, and (for
 * AUROC/AUPRC and calibration) produce an error record.
 */
import { computeAuroc, computeAuprc, countClasses } from './discrimination.js';
import { checkProbabilityDomain, computeBrier, computeReliabilityBins } from './calibration.js';
import { confusionAt, thresholdedMetrics } from './thresholded.js';
import { bootstrapIntervals, deriveSeed } from './bootstrap.js';
import { DEFAULT_THRESHOLD } from '../config/schema.js';
import {
  CalibrationDomainError,
  UndefinedMetricError,
} from '../errors/benchmark-errors.js';
import { METRIC_NAMES } from '../types/evaluation.js';
import type { EvaluationConfig } from '../config/types.js';
import type { BinaryLabel } from '../types/variant.js';
import type {
  AlignedDataset,
  CalibrationStatus,
  ConfidenceIntervals,
  EvaluationErrorRecord,
  MetricName,
  MetricsRecord,
  ReliabilityBin,
  ScoreDomain,
  ThresholdPolicy,
} from '../types/evaluation.js';

export interface DatasetEvaluation {
  /** null for an empty dataset */
  record: MetricsRecord | null;
  errors: EvaluationErrorRecord[];
}

type PointMetrics = Record<MetricName, number>;

/**
 * Operating threshold for a tool: per-tool override, then the configured
 * threshold, then the built-in default.
 */
export function resolveThreshold(tool: string, config: EvaluationConfig): ThresholdPolicy {
  if (Object.hasOwn(config.toolThresholds, tool)) {
    return { value: config.toolThresholds[tool], source: 'tool' };
  }
  if (config.threshold !== undefined) {
    return { value: config.threshold, source: 'configured' };
  }
  return { value: DEFAULT_THRESHOLD, source: 'default' };
}

export function resolveScoreDomain(tool: string, config: EvaluationConfig): ScoreDomain {
  return Object.hasOwn(config.scoreDomains, tool)
    ? config.scoreDomains[tool]
    : config.defaultScoreDomain;
}

/**
 * Every metric of one (sub)sample. Brier is only meaningful when calibration
 * applies, so callers pass `withBrier`.
 */
function computePointMetrics(
  scores: readonly number[],
  labels: readonly BinaryLabel[],
  threshold: number,
  withBrier: boolean,
): PointMetrics {
  return {
    auroc: computeAuroc(scores, labels),
    auprc: computeAuprc(scores, labels),
    brier: withBrier ? computeBrier(scores, labels) : NaN,
    ...thresholdedMetrics(confusionAt(scores, labels, threshold)),
  };
}

/**
 * Compute the MetricsRecord for one tool.
 */
export function evaluateDataset(
  dataset: AlignedDataset,
  config: EvaluationConfig,
): DatasetEvaluation {
  const { tool, pairs } = dataset;
  const n = pairs.length;
  if (n === 0) {
    return { record: null, errors: [] };
  }

  const errors: EvaluationErrorRecord[] = [];
  const scores = pairs.map((p) => p.score);
  const labels = pairs.map((p) => p.label);
  const { positives, negatives } = countClasses(labels);
  const threshold = resolveThreshold(tool, config);
  const scoreDomain = resolveScoreDomain(tool, config);

  // Calibration
  let calibrationStatus: CalibrationStatus;
  let reliability: ReliabilityBin[] | null = null;
  if (scoreDomain === 'unbounded') {
    calibrationStatus = 'not_applicable';
  } else {
    const domain = checkProbabilityDomain(scores);
    if (domain.outOfRange > 0) {
      calibrationStatus = 'domain_error';
      errors.push(
        new CalibrationDomainError(tool, domain.outOfRange, domain.min, domain.max).toRecord(),
      );
    } else {
      calibrationStatus = 'computed';
      reliability = computeReliabilityBins(scores, labels, config.reliabilityBins);
    }
  }
  const withBrier = calibrationStatus === 'computed';

  const point = computePointMetrics(scores, labels, threshold.value, withBrier);
  const confusion = confusionAt(scores, labels, threshold.value);

  if (positives === 0 || negatives === 0) {
    errors.push(
      new UndefinedMetricError(
        tool,
        ['auroc', 'auprc'],
        `labels are single-class (${positives} positive, ${negatives} negative)`,
      ).toRecord(),
    );
  }

  const undefinedMetrics = METRIC_NAMES.filter(
    (name) => !Number.isFinite(point[name]) && !(name === 'brier' && !withBrier),
  );

  const ci = computeIntervals(tool, scores, labels, threshold.value, withBrier, point, config);

  const record: MetricsRecord = {
    tool,
    n,
    nPositive: positives,
    nNegative: negatives,
    ...point,
    confusion,
    threshold,
    scoreDomain,
    calibrationStatus,
    reliability,
    undefinedMetrics,
    ci,
  };

  return { record, errors };
}

function computeIntervals(
  tool: string,
  scores: readonly number[],
  labels: readonly BinaryLabel[],
  threshold: number,
  withBrier: boolean,
  point: PointMetrics,
  config: EvaluationConfig,
): ConfidenceIntervals {
  const n = scores.length;
  if (n < config.minimumNForCI) {
    return {
      status: 'not_computed',
      reason: `n=${n} is below minimumNForCI=${config.minimumNForCI}`,
    };
  }

  const seed = deriveSeed(config.randomSeed, tool);
  const { intervals, skippedDraws } = bootstrapIntervals(
    n,
    METRIC_NAMES,
    (indices) =>
      computePointMetrics(
        indices.map((i) => scores[i]),
        indices.map((i) => labels[i]),
        threshold,
        withBrier,
      ),
    point,
    { draws: config.bootstrapDraws, level: config.ciLevel, seed },
  );

  const skippedAuroc = skippedDraws.auroc ?? 0;
  if (skippedAuroc > 0) {
    console.warn(
      `${tool}: ${skippedAuroc} of ${config.bootstrapDraws} bootstrap draws were single-class and skipped for AUROC/AUPRC`,
    );
  }

  return {
    status: 'computed',
    level: config.ciLevel,
    draws: config.bootstrapDraws,
    seed,
    intervals,
    skippedDraws,
  };
}

