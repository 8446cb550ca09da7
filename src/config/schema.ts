/**
 * Zod schema for the evaluation configuration.
 *
 * Every field except `threshold` has a `.default()` so
 * `EvaluationConfigSchema.parse({})` returns a complete config. `threshold`
 * stays optional so the engine can report whether the operating threshold
 * was supplied or defaulted.
 *
 * @module config/schema
 */

import { z } from 'zod';
import type { EvaluationConfig } from './types.js';

/** Operating threshold used when none is configured. */
export const DEFAULT_THRESHOLD = 0.5;

export const ScoreDomainSchema = z.enum(['probability', 'unbounded']);

/**
 * Complete evaluation config schema with defaults on every field.
 *
 * ```typescript
 * const config = EvaluationConfigSchema.parse({ threshold: 0.7, bootstrapDraws: 2000 });
 * ```
 */
export const EvaluationConfigSchema = z.object({
  threshold: z.number().finite().optional(),
  toolThresholds: z.record(z.string().min(1), z.number().finite()).default({}),
  bootstrapDraws: z.number().int().min(1).max(1_000_000).default(1000),
  minimumNForCI: z.number().int().min(1).default(50),
  reliabilityBins: z.number().int().min(1).max(1000).default(10),
  randomSeed: z.number().int().min(0).max(0xffffffff).default(42),
  ciLevel: z.number().gt(0).lt(1).default(0.95),
  scoreDomains: z.record(z.string().min(1), ScoreDomainSchema).default({}),
  defaultScoreDomain: ScoreDomainSchema.default('probability'),
});

export type InferredEvaluationConfig = z.infer<typeof EvaluationConfigSchema>;

/**
 * Input accepted by the schema: any subset of the options.
 */
export type EvaluationConfigInput = z.input<typeof EvaluationConfigSchema>;

export const DEFAULT_EVALUATION_CONFIG: EvaluationConfig = EvaluationConfigSchema.parse({});
