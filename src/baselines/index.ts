export {
  loadVariantTable,
  randomBaseline,
  positionSineBaseline,
  writeBaselineFiles,
  RANDOM_BASELINE,
  POSITION_SINE_BASELINE,
} from './baseline-predictors.js';
