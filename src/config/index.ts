export type { EvaluationConfig } from './types.js';
export type { EvaluationConfigInput, InferredEvaluationConfig } from './schema.js';
export {
  EvaluationConfigSchema,
  ScoreDomainSchema,
  DEFAULT_EVALUATION_CONFIG,
  DEFAULT_THRESHOLD,
} from './schema.js';
export {
  readEvaluationConfig,
  resolveEvaluationConfig,
  validateEvaluationConfig,
  DEFAULT_CONFIG_PATH,
} from './reader.js';
