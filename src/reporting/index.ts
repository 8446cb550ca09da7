export {
  UNDEFINED_CELL,
  formatMetric,
  formatTableNumber,
  formatWithInterval,
  intervalFor,
} from './format.js';
export { formatMetricsTable, METRICS_TABLE_COLUMNS } from './metrics-table.js';
export { renderMarkdownReport } from './markdown-report.js';
export { formatTerminalSummary } from './terminal-summary.js';
export type { InputProvenance, InputRole, RunProvenance } from './provenance.js';
export { buildProvenance, countDataRows, describeInput, hashInput } from './provenance.js';
export type { ArtifactPaths } from './artifacts.js';
export { ARTIFACT_FILES, serializeResult, writeReportArtifacts } from './artifacts.js';
