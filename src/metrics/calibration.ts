/**
 * Calibration metrics for tools whose scores are probabilities.
 */
import { mean } from 'simple-statistics';
import type { BinaryLabel } from '../types/variant.js';
import type { ReliabilityBin } from '../types/evaluation.js';

export interface DomainCheck {
  /** Number of scores outside [0,1] */
  outOfRange: number;
  min: number;
  max: number;
}

/**
 * Count scores outside the probability domain [0,1].
 */
export function checkProbabilityDomain(scores: readonly number[]): DomainCheck {
  let outOfRange = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const s of scores) {
    if (s < 0 || s > 1) outOfRange++;
    if (s < min) min = s;
    if (s > max) max = s;
  }
  return { outOfRange, min, max };
}

/**
 * Brier score: mean squared difference between score and outcome.
 * NaN for an empty dataset.
 */
export function computeBrier(scores: readonly number[], labels: readonly BinaryLabel[]): number {
  if (scores.length === 0) return NaN;
  return mean(scores.map((s, i) => (s - labels[i]) ** 2));
}

/**
 * Bin index of a probability: `floor(score * nBins)`, with 1.0 in the last bin.
 */
export function binIndex(score: number, nBins: number): number {
  return Math.min(Math.floor(score * nBins), nBins - 1);
}

/**
 * Equal-width reliability bins over [0,1]. Every bin is returned; empty bins
 * have `n = 0` and NaN rates.
 */
export function computeReliabilityBins(
  scores: readonly number[],
  labels: readonly BinaryLabel[],
  nBins: number,
): ReliabilityBin[] {
  const members: Array<{ scores: number[]; labels: number[] }> = Array.from(
    { length: nBins },
    () => ({ scores: [], labels: [] }),
  );

  scores.forEach((score, i) => {
    const bin = members[binIndex(score, nBins)];
    bin.scores.push(score);
    bin.labels.push(labels[i]);
  });

  return members.map((bin, i) => ({
    bin: i,
    lower: i / nBins,
    upper: (i + 1) / nBins,
    n: bin.scores.length,
    meanScore: bin.scores.length > 0 ? mean(bin.scores) : NaN,
    observedRate: bin.labels.length > 0 ? mean(bin.labels) : NaN,
  }));
}
