export {
  BenchmarkError,
  MalformedVariant,
  SchemaError,
  EmptyDatasetError,
  ConfigError,
  ToolEvaluationError,
  NoOverlapError,
  UndefinedMetricError,
  CalibrationDomainError,
} from './benchmark-errors.js';
