/**
 * Colour terminal summary of an evaluation result.
 */
import pc from 'picocolors';
import { formatMetric } from './format.js';
import type { EvaluationResult } from '../types/evaluation.js';

/**
 * Green >= 0.9, yellow >= 0.7, red below; NA dimmed.
 */
function colorAuroc(value: number): string {
  const text = formatMetric(value);
  if (!Number.isFinite(value)) return pc.dim(text);
  if (value >= 0.9) return pc.green(text);
  if (value >= 0.7) return pc.yellow(text);
  return pc.red(text);
}

function dimIfUndefined(value: number): string {
  const text = formatMetric(value);
  return Number.isFinite(value) ? text : pc.dim(text);
}

/**
 * Pad string to a minimum width (right-padded).
 */
function pad(str: string, width: number): string {
  // Strip ANSI codes for length calculation
  const stripped = str.replace(/\x1b\[[0-9;]*m/g, '');
  const diff = width - stripped.length;
  return diff > 0 ? str + ' '.repeat(diff) : str;
}

export function formatTerminalSummary(result: EvaluationResult): string {
  const lines: string[] = [];
  lines.push(pc.bold('Variant Benchmark'));
  lines.push(`${result.coverage.size} tool(s), ${result.nLabels} labeled variant(s)`);
  lines.push('');

  if (result.errors.length > 0) {
    lines.push(pc.bold(pc.red(`Errors (${result.errors.length}):`)));
    for (const error of result.errors) {
      lines.push(`  ${pc.red(error.kind)} ${error.tool}: ${error.message}`);
    }
    lines.push('');
  }

  const cols = { tool: 24, n: 8, auroc: 9, auprc: 9, brier: 9, sens: 9, spec: 9 };
  const header = [
    pad('Tool', cols.tool),
    pad('n', cols.n),
    pad('AUROC', cols.auroc),
    pad('AUPRC', cols.auprc),
    pad('Brier', cols.brier),
    pad('Sens', cols.sens),
    'Spec',
  ].join('');
  lines.push(pc.dim(header));
  lines.push(pc.dim('─'.repeat(76)));

  for (const m of result.metrics) {
    const tool = m.tool.length > cols.tool - 2 ? m.tool.slice(0, cols.tool - 5) + '...' : m.tool;
    lines.push(
      [
        pad(tool, cols.tool),
        pad(String(m.n), cols.n),
        pad(colorAuroc(m.auroc), cols.auroc),
        pad(dimIfUndefined(m.auprc), cols.auprc),
        pad(dimIfUndefined(m.brier), cols.brier),
        pad(dimIfUndefined(m.sensitivity), cols.sens),
        dimIfUndefined(m.specificity),
      ].join(''),
    );
  }

  const top = result.metrics[0];
  if (top && Number.isFinite(top.auroc)) {
    lines.push('');
    lines.push(`Top tool: ${pc.cyan(top.tool)} (AUROC ${formatMetric(top.auroc)})`);
  }

  return lines.join('\n');
}
