export type { DelimitedTable, TableRow, KeyShape } from './delimited-table.js';
export {
  readDelimitedTable,
  parseDelimitedText,
  delimiterFor,
  normalizeHeader,
  requireColumns,
  resolveKeyShape,
  variantKeyFromRow,
  parseFiniteNumber,
  DELIMITERS,
} from './delimited-table.js';

export { PredictionStore, readPredictionRows } from './prediction-store.js';
export { LabelStore } from './label-store.js';
export { splitWideTable, formatLongTable } from './wide-table.js';
