// ============================================================================
// Benchmark Error Taxonomy
// ============================================================================
// Load-level errors (MalformedVariant, SchemaError, EmptyDatasetError) are
// thrown and abort the load of a file. Per-tool errors (NoOverlapError,
// UndefinedMetricError, CalibrationDomainError) are collected into the
// evaluation result and never abort other tools.

import type { EvaluationErrorKind, EvaluationErrorRecord } from '../types/evaluation.js';

/**
 * Base class for every error the engine raises.
 *
 * `kind` is stable and equal to the class name so callers can switch on it
 * after serialization.
 */
export abstract class BenchmarkError extends Error {
  abstract readonly kind: string;
}

/**
 * A variant key field is missing or invalid.
 */
export class MalformedVariant extends BenchmarkError {
  override name = 'MalformedVariant' as const;
  readonly kind = 'MalformedVariant' as const;

  constructor(message: string) {
    super(message);
  }
}

/**
 * A tabular input file has the wrong structure or a bad value.
 */
export class SchemaError extends BenchmarkError {
  override name = 'SchemaError' as const;
  readonly kind = 'SchemaError' as const;

  constructor(
    message: string,
    public readonly file: string,
    public readonly row?: number,
  ) {
    super(row === undefined ? `${file}: ${message}` : `${file} (row ${row}): ${message}`);
  }
}

/**
 * An input had zero usable rows.
 */
export class EmptyDatasetError extends BenchmarkError {
  override name = 'EmptyDatasetError' as const;
  readonly kind = 'EmptyDatasetError' as const;

  constructor(message: string) {
    super(message);
  }
}

/**
 * Configuration could not be read or failed validation.
 */
export class ConfigError extends BenchmarkError {
  override name = 'ConfigError' as const;
  readonly kind = 'ConfigError' as const;

  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
  }
}

/**
 * Base for errors that are recorded per tool instead of thrown.
 */
export abstract class ToolEvaluationError extends BenchmarkError {
  abstract override readonly kind: EvaluationErrorKind;

  constructor(
    public readonly tool: string,
    message: string,
  ) {
    super(message);
  }

  toRecord(): EvaluationErrorRecord {
    return { tool: this.tool, kind: this.kind, message: this.message };
  }
}

/**
 * A tool scored none of the labeled variants.
 */
export class NoOverlapError extends ToolEvaluationError {
  override name = 'NoOverlapError' as const;
  readonly kind = 'NoOverlapError' as const;
}

/**
 * A metric cannot be computed for the dataset (e.g. single-class labels).
 */
export class UndefinedMetricError extends ToolEvaluationError {
  override name = 'UndefinedMetricError' as const;
  readonly kind = 'UndefinedMetricError' as const;

  constructor(
    tool: string,
    public readonly metrics: readonly string[],
    reason: string,
  ) {
    super(tool, `${metrics.join(', ')} undefined: ${reason}`);
  }
}

/**
 * A probability-domain tool emitted scores outside [0,1].
 */
export class CalibrationDomainError extends ToolEvaluationError {
  override name = 'CalibrationDomainError' as const;
  readonly kind = 'CalibrationDomainError' as const;

  constructor(
    tool: string,
    public readonly outOfRange: number,
    public readonly min: number,
    public readonly max: number,
  ) {
    super(
      tool,
      `${outOfRange} score(s) outside [0,1] (observed range ${min}..${max}); ` +
        `declare the tool's score domain as 'unbounded' to skip calibration metrics`,
    );
  }
}
