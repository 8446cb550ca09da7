/**
 * Number and cell formatting shared by the report writers.
 *
 * Undefined metrics (NaN) are always printed as `NA`, never as 0.
 */
import type { ConfidenceIntervals, Interval, MetricName, MetricsRecord } from '../types/evaluation.js';

export const UNDEFINED_CELL = 'NA';

/**
 * Fixed-decimal rendering for human-facing output.
 */
export function formatMetric(value: number, digits = 3): string {
  return Number.isFinite(value) ? value.toFixed(digits) : UNDEFINED_CELL;
}

/**
 * Compact rendering for machine-facing tables (at most 6 decimals).
 */
export function formatTableNumber(value: number): string {
  return Number.isFinite(value) ? String(Math.round(value * 1e6) / 1e6) : UNDEFINED_CELL;
}

export function intervalFor(ci: ConfidenceIntervals, metric: MetricName): Interval | undefined {
  return ci.status === 'computed' ? ci.intervals[metric] : undefined;
}

/**
 * `0.875 [0.800, 0.950]` when an interval exists, else just the estimate.
 */
export function formatWithInterval(record: MetricsRecord, metric: MetricName, digits = 3): string {
  const estimate = formatMetric(record[metric], digits);
  const interval = intervalFor(record.ci, metric);
  if (!interval) return estimate;
  return `${estimate} [${interval.low.toFixed(digits)}, ${interval.high.toFixed(digits)}]`;
}
