export {
  computeAuroc,
  computeAurocMannWhitney,
  computeAuprc,
  midRanks,
  countClasses,
} from './discrimination.js';
export type { DomainCheck } from './calibration.js';
export {
  computeBrier,
  computeReliabilityBins,
  checkProbabilityDomain,
  binIndex,
} from './calibration.js';
export type { ThresholdedMetrics } from './thresholded.js';
export { confusionAt, thresholdedMetrics } from './thresholded.js';
export { calculateMCC } from './mcc-calculator.js';
export type { Rng, BootstrapOptions, BootstrapResult } from './bootstrap.js';
export {
  mulberry32,
  deriveSeed,
  drawIndices,
  percentileInterval,
  bootstrapIntervals,
} from './bootstrap.js';
export type { DatasetEvaluation } from './metric-engine.js';
export { evaluateDataset, resolveThreshold, resolveScoreDomain } from './metric-engine.js';
