/**
 * Tab-separated metrics table, one row per evaluated tool in ranking order.
 */
import { formatTableNumber, intervalFor } from './format.js';
import type { EvaluationResult, MetricName, MetricsRecord } from '../types/evaluation.js';

const CI_METRICS: readonly MetricName[] = ['auroc', 'auprc', 'brier'];

export const METRICS_TABLE_COLUMNS: readonly string[] = [
  'tool',
  'n',
  'n_positive',
  'n_negative',
  'auroc',
  'auroc_ci_low',
  'auroc_ci_high',
  'auprc',
  'auprc_ci_low',
  'auprc_ci_high',
  'brier',
  'brier_ci_low',
  'brier_ci_high',
  'threshold',
  'threshold_source',
  'sensitivity',
  'specificity',
  'ppv',
  'npv',
  'f1',
  'mcc',
  'tp',
  'fp',
  'tn',
  'fn',
  'score_domain',
  'calibration_status',
  'ci_status',
];

function metricCells(record: MetricsRecord, metric: MetricName): string[] {
  const value = formatTableNumber(record[metric]);
  if (!CI_METRICS.includes(metric)) return [value];
  const interval = intervalFor(record.ci, metric);
  return interval
    ? [value, formatTableNumber(interval.low), formatTableNumber(interval.high)]
    : [value, '', ''];
}

function toRow(record: MetricsRecord): string[] {
  const { confusion } = record;
  return [
    record.tool,
    String(record.n),
    String(record.nPositive),
    String(record.nNegative),
    ...metricCells(record, 'auroc'),
    ...metricCells(record, 'auprc'),
    ...metricCells(record, 'brier'),
    formatTableNumber(record.threshold.value),
    record.threshold.source,
    ...metricCells(record, 'sensitivity'),
    ...metricCells(record, 'specificity'),
    ...metricCells(record, 'ppv'),
    ...metricCells(record, 'npv'),
    ...metricCells(record, 'f1'),
    ...metricCells(record, 'mcc'),
    String(confusion.tp),
    String(confusion.fp),
    String(confusion.tn),
    String(confusion.fn),
    record.scoreDomain,
    record.calibrationStatus,
    record.ci.status,
  ];
}

/**
 * Render the metrics table. CI cells stay blank when no interval exists.
 */
export function formatMetricsTable(result: EvaluationResult): string {
  const lines = [METRICS_TABLE_COLUMNS.join('\t'), ...result.metrics.map((r) => toRow(r).join('\t'))];
  return lines.join('\n') + '\n';
}
