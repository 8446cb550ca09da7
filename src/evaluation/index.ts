export { evaluate, runEvaluation, compareMetricsRecords } from './run-evaluation.js';
