/**
 * Evaluation config file reader with Zod validation.
 *
 * Missing file = all defaults. Invalid JSON or an out-of-range value throws
 * a ConfigError naming the field.
 *
 * @module config/reader
 */

import { readFile } from 'fs/promises';
import type { ZodIssue } from 'zod';
import { EvaluationConfigSchema, DEFAULT_EVALUATION_CONFIG } from './schema.js';
import { ConfigError } from '../errors/benchmark-errors.js';
import type { EvaluationConfig } from './types.js';

/** Default path for the config file, relative to the working directory. */
export const DEFAULT_CONFIG_PATH = 'variant-bench.config.json';

function formatIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validate raw input against the config schema (no I/O).
 */
export function validateEvaluationConfig(
  raw: unknown,
): { valid: true; config: EvaluationConfig } | { valid: false; errors: string[] } {
  const result = EvaluationConfigSchema.safeParse(raw);
  if (result.success) {
    return { valid: true, config: result.data };
  }
  return { valid: false, errors: formatIssues(result.error.issues) };
}

/**
 * Parse and validate a config object, throwing on failure.
 *
 * @throws {ConfigError} With every failing field listed
 */
export function resolveEvaluationConfig(raw: unknown = {}): EvaluationConfig {
  const result = EvaluationConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Config validation failed:\n${formatIssues(result.error.issues).join('\n')}`,
      result.error.issues[0]?.path.join('.'),
    );
  }
  return result.data;
}

/**
 * Read and validate the config file from disk.
 *
 * @throws {ConfigError} On invalid JSON or validation failure
 */
export async function readEvaluationConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
): Promise<EvaluationConfig> {
  let content: string;

  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return DEFAULT_EVALUATION_CONFIG;
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new ConfigError(`Invalid JSON in config file: ${configPath}`);
  }

  return resolveEvaluationConfig(raw);
}
