/**
 * Narrative Markdown report.
 *
 * Errors come first so a reader never sees a ranking without the caveats.
 * Metrics are split into a research lens (threshold-free discrimination) and
 * a clinical lens (behaviour at the operating threshold).
 */
import { formatMetric, formatWithInterval } from './format.js';
import type { RunProvenance } from './provenance.js';
import type { EvaluationResult, MetricsRecord } from '../types/evaluation.js';

function table(header: readonly string[], rows: readonly string[][]): string[] {
  return [
    `| ${header.join(' | ')} |`,
    `|${header.map(() => '---').join('|')}|`,
    ...rows.map((row) => `| ${row.join(' | ')} |`),
  ];
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

function brierCell(record: MetricsRecord): string {
  switch (record.calibrationStatus) {
    case 'computed':
      return formatWithInterval(record, 'brier');
    case 'not_applicable':
      return 'not applicable';
    case 'domain_error':
      return 'domain error';
  }
}

function errorsSection(result: EvaluationResult): string[] {
  const lines = ['## Errors', ''];
  if (result.errors.length === 0) {
    lines.push('No errors.');
    return lines;
  }
  lines.push(
    ...table(
      ['Tool', 'Kind', 'Message'],
      result.errors.map((e) => [escapeCell(e.tool), e.kind, escapeCell(e.message)]),
    ),
  );
  return lines;
}

function coverageSection(result: EvaluationResult): string[] {
  const rows = [...result.coverage].map(([tool, c]) => [
    escapeCell(tool),
    String(c.nScored),
    String(c.nLabeled),
    String(c.nMatched),
  ]);
  return ['## Coverage', '', ...table(['Tool', 'Scored', 'Labeled', 'Matched'], rows)];
}

function researchSection(metrics: readonly MetricsRecord[]): string[] {
  const rows = metrics.map((m) => [
    escapeCell(m.tool),
    String(m.n),
    String(m.nPositive),
    String(m.nNegative),
    formatWithInterval(m, 'auroc'),
    formatWithInterval(m, 'auprc'),
  ]);
  return [
    '## Research setting',
    '',
    ...table(['Tool', 'n', 'Positives', 'Negatives', 'AUROC', 'AUPRC'], rows),
  ];
}

function clinicalSection(metrics: readonly MetricsRecord[]): string[] {
  const rows = metrics.map((m) => [
    escapeCell(m.tool),
    `${m.threshold.value} (${m.threshold.source})`,
    formatWithInterval(m, 'sensitivity'),
    formatWithInterval(m, 'specificity'),
    formatWithInterval(m, 'ppv'),
    formatWithInterval(m, 'npv'),
    formatWithInterval(m, 'f1'),
    formatWithInterval(m, 'mcc'),
    brierCell(m),
  ]);
  return [
    '## Clinical setting',
    '',
    ...table(
      ['Tool', 'Threshold', 'Sensitivity', 'Specificity', 'PPV', 'NPV', 'F1', 'MCC', 'Brier'],
      rows,
    ),
  ];
}

function calibrationSection(metrics: readonly MetricsRecord[]): string[] {
  const lines = ['## Calibration'];
  for (const m of metrics) {
    lines.push('', `### ${m.tool}`, '');
    if (!m.reliability) {
      lines.push(
        m.calibrationStatus === 'not_applicable'
          ? 'Scores are not probabilities; calibration is not applicable.'
          : 'Scores fall outside [0,1]; calibration was not computed.',
      );
      continue;
    }
    const rows = m.reliability.map((b) => [
      String(b.bin),
      `${b.lower.toFixed(2)}-${b.upper.toFixed(2)}`,
      String(b.n),
      b.n > 0 ? formatMetric(b.meanScore) : '-',
      b.n > 0 ? formatMetric(b.observedRate) : '-',
    ]);
    lines.push(...table(['Bin', 'Range', 'n', 'Mean score', 'Observed rate'], rows));
  }
  return lines;
}

function summarySection(metrics: readonly MetricsRecord[]): string[] {
  const top = metrics[0];
  if (!top || !Number.isFinite(top.auroc)) {
    return ['## Summary', '', 'No tool produced a defined AUROC.'];
  }
  return [
    '## Summary',
    '',
    `Top-ranked tool: **${top.tool}** (AUROC ${formatWithInterval(top, 'auroc')}, n=${top.n}).`,
  ];
}

function provenanceSection(provenance: RunProvenance): string[] {
  return [
    '## Provenance',
    '',
    `Generated at ${provenance.generatedAt}.`,
    '',
    ...table(
      ['Role', 'Path', 'Rows', 'SHA-256'],
      provenance.inputs.map((i) => [i.role, escapeCell(i.path), String(i.rows), `\`${i.sha256}\``]),
    ),
    '',
    '```json',
    JSON.stringify(provenance.config, null, 2),
    '```',
  ];
}

/**
 * Render the full report.
 */
export function renderMarkdownReport(result: EvaluationResult, provenance: RunProvenance): string {
  const sections = [
    ['# Variant effect predictor benchmark', '', `${result.metrics.length} of ${result.coverage.size} tool(s) evaluated against ${result.nLabels} labeled variant(s).`],
    errorsSection(result),
    coverageSection(result),
    researchSection(result.metrics),
    clinicalSection(result.metrics),
    calibrationSection(result.metrics),
    summarySection(result.metrics),
    provenanceSection(provenance),
  ];
  return sections.map((lines) => lines.join('\n')).join('\n\n') + '\n';
}
