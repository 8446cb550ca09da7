/**
 * Discrimination metrics: AUROC and AUPRC.
 *
 * Both are undefined (NaN) unless the labels contain both classes. Tied
 * scores are handled without any dependence on input order: AUROC uses
 * mid-ranks, AUPRC steps over distinct score values only.
 */
import type { BinaryLabel } from '../types/variant.js';

/**
 * 1-based ranks with ties assigned the average of the positions they span.
 */
export function midRanks(values: readonly number[]): number[] {
  const order = values.map((_, i) => i).sort((a, b) => values[a] - values[b]);
  const ranks = new Array<number>(values.length);

  let start = 0;
  while (start < order.length) {
    let end = start;
    while (end + 1 < order.length && values[order[end + 1]] === values[order[start]]) {
      end++;
    }
    // positions start+1 .. end+1 share their mean
    const rank = (start + end + 2) / 2;
    for (let k = start; k <= end; k++) {
      ranks[order[k]] = rank;
    }
    start = end + 1;
  }

  return ranks;
}

export function countClasses(labels: readonly BinaryLabel[]): { positives: number; negatives: number } {
  let positives = 0;
  for (const label of labels) {
    if (label === 1) positives++;
  }
  return { positives, negatives: labels.length - positives };
}

/**
 * AUROC from the rank-sum (Wilcoxon) statistic with mid-ranks.
 *
 * AUROC = (R+ - n+(n+ + 1)/2) / (n+ n-)
 */
export function computeAuroc(scores: readonly number[], labels: readonly BinaryLabel[]): number {
  const { positives, negatives } = countClasses(labels);
  if (positives === 0 || negatives === 0) return NaN;

  const ranks = midRanks(scores);
  let positiveRankSum = 0;
  for (let i = 0; i < labels.length; i++) {
    if (labels[i] === 1) positiveRankSum += ranks[i];
  }

  const u = positiveRankSum - (positives * (positives + 1)) / 2;
  return u / (positives * negatives);
}

/**
 * AUROC as the Mann-Whitney probability P(score+ > score-) + 0.5 P(tie),
 * by direct pair counting. Quadratic; used to cross-check `computeAuroc`.
 */
export function computeAurocMannWhitney(
  scores: readonly number[],
  labels: readonly BinaryLabel[],
): number {
  const positive: number[] = [];
  const negative: number[] = [];
  for (let i = 0; i < labels.length; i++) {
    (labels[i] === 1 ? positive : negative).push(scores[i]);
  }
  if (positive.length === 0 || negative.length === 0) return NaN;

  let u = 0;
  for (const p of positive) {
    for (const n of negative) {
      if (p > n) u += 1;
      else if (p === n) u += 0.5;
    }
  }
  return u / (positive.length * negative.length);
}

/**
 * AUPRC as average precision: sum over distinct thresholds (descending) of
 * (R_k - R_{k-1}) * P_k. All variants sharing a score enter together.
 */
export function computeAuprc(scores: readonly number[], labels: readonly BinaryLabel[]): number {
  const { positives, negatives } = countClasses(labels);
  if (positives === 0 || negatives === 0) return NaN;

  const order = scores.map((_, i) => i).sort((a, b) => scores[b] - scores[a]);

  let tp = 0;
  let fp = 0;
  let previousRecall = 0;
  let ap = 0;
  let i = 0;
  while (i < order.length) {
    const threshold = scores[order[i]];
    while (i < order.length && scores[order[i]] === threshold) {
      if (labels[order[i]] === 1) tp++;
      else fp++;
      i++;
    }
    const recall = tp / positives;
    const precision = tp / (tp + fp);
    ap += (recall - previousRecall) * precision;
    previousRecall = recall;
  }

  return ap;
}
