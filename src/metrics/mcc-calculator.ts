/**
 * Matthews Correlation Coefficient (MCC) for binary classification.
 *
 * MCC is the Pearson correlation between predicted and actual classes and
 * uses all four confusion matrix cells.
 */

/**
 * Calculate Matthews Correlation Coefficient.
 *
 * Formula: (TP*TN - FP*FN) / sqrt((TP+FP)(TP+FN)(TN+FP)(TN+FN))
 *
 * @returns MCC in [-1, 1], or NaN when any marginal is zero (all predictions
 *   or all actuals in one class)
 */
export function calculateMCC(
  tp: number,
  tn: number,
  fp: number,
  fn: number
): number {
  const numerator = tp * tn - fp * fn;
  const denominator = Math.sqrt(
    (tp + fp) * (tp + fn) * (tn + fp) * (tn + fn)
  );

  if (denominator === 0) {
    return NaN;
  }

  return numerator / denominator;
}
