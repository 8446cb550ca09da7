/**
 * Type definitions for the evaluation configuration.
 *
 * The interface documents every option; `schema.ts` enforces ranges and
 * supplies defaults.
 *
 * @module config/types
 */

import type { ScoreDomain } from '../types/evaluation.js';

export interface EvaluationConfig {
  /**
   * Operating threshold for thresholded metrics. Left unset, the built-in
   * DEFAULT_THRESHOLD (0.5) applies and is reported as the 'default' source.
   */
  threshold?: number;
  /** Per-tool operating thresholds; these override `threshold`. */
  toolThresholds: Record<string, number>;
  /** Bootstrap resamples per tool (default 1000). */
  bootstrapDraws: number;
  /** Minimum matched variants before a CI is computed (default 50). */
  minimumNForCI: number;
  /** Equal-width reliability bins over [0,1] (default 10). */
  reliabilityBins: number;
  /** Base seed; per-tool seeds are derived from it and the tool name (default 42). */
  randomSeed: number;
  /** Two-sided confidence level of the percentile interval (default 0.95). */
  ciLevel: number;
  /** Per-tool score domain declarations. */
  scoreDomains: Record<string, ScoreDomain>;
  /** Score domain of tools not listed in `scoreDomains` (default 'probability'). */
  defaultScoreDomain: ScoreDomain;
}
