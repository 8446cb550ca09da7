/**
 * Metrics at a fixed operating threshold.
 *
 * A variant is called pathogenic when `score >= threshold`. Every ratio whose
 * denominator is zero is NaN (e.g. PPV with no predicted positives).
 */
import { calculateMCC } from './mcc-calculator.js';
import type { BinaryLabel } from '../types/variant.js';
import type { ConfusionMatrix } from '../types/evaluation.js';

export interface ThresholdedMetrics {
  sensitivity: number;
  specificity: number;
  ppv: number;
  npv: number;
  f1: number;
  mcc: number;
}

export function confusionAt(
  scores: readonly number[],
  labels: readonly BinaryLabel[],
  threshold: number,
): ConfusionMatrix {
  let tp = 0, fp = 0, tn = 0, fn = 0;

  for (let i = 0; i < scores.length; i++) {
    const predicted = scores[i] >= threshold;
    const actual = labels[i] === 1;

    if (predicted && actual) tp++;
    else if (predicted && !actual) fp++;
    else if (!predicted && actual) fn++;
    else tn++;
  }

  return { tp, fp, tn, fn };
}

function ratio(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : NaN;
}

export function thresholdedMetrics({ tp, fp, tn, fn }: ConfusionMatrix): ThresholdedMetrics {
  return {
    sensitivity: ratio(tp, tp + fn),
    specificity: ratio(tn, tn + fp),
    ppv: ratio(tp, tp + fp),
    npv: ratio(tn, tn + fn),
    // 2PR/(P+R) rewritten so it is defined whenever TP+FP+FN > 0
    f1: ratio(2 * tp, 2 * tp + fp + fn),
    mcc: calculateMCC(tp, tn, fp, fn),
  };
}
