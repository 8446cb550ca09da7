/**
 * Conversion of wide score tables (`variant_id,ToolA,ToolB,...`) into the
 * long `variant_id,score,tool` layout the prediction store reads.
 */
import {
  resolveKeyShape,
  variantKeyFromRow,
  parseFiniteNumber,
  type DelimitedTable,
} from './delimited-table.js';
import { SchemaError } from '../errors/benchmark-errors.js';
import { canonicalForm } from '../variants/variant-key.js';
import type { PredictionRecord } from '../types/variant.js';

/** Cell values treated as "tool did not score this variant". */
const MISSING_VALUES = new Set(['', 'na', 'nan', '.', 'null']);

const KEY_COLUMNS = new Set(['variant_id', 'chrom', 'pos', 'ref', 'alt']);

/**
 * Split a wide table into per-tool records, grouped by tool in column order.
 *
 * @throws {SchemaError} When there are no tool columns or a cell is not numeric
 */
export function splitWideTable(table: DelimitedTable): Map<string, PredictionRecord[]> {
  const shape = resolveKeyShape(table);
  // Tool names keep the header's original spelling (e.g. `SpliceAI`).
  const toolColumns = table.columns
    .map((column, i) => ({ column, tool: table.rawColumns[i] }))
    .filter(({ column }) => !KEY_COLUMNS.has(column));
  if (toolColumns.length === 0) {
    throw new SchemaError('wide table has no tool columns', table.source);
  }

  const byTool = new Map<string, PredictionRecord[]>();
  for (const { tool } of toolColumns) byTool.set(tool, []);

  for (const row of table.rows) {
    const variant = variantKeyFromRow(table, row, shape);
    for (const { column, tool } of toolColumns) {
      const cell = row.values[column];
      if (MISSING_VALUES.has(cell.toLowerCase())) continue;
      const score = parseFiniteNumber(cell, tool, table, row);
      byTool.get(tool)?.push({ variant, tool, score });
    }
  }
  return byTool;
}

/**
 * Render records as a tab-separated `variant_id\tscore\ttool` table.
 */
export function formatLongTable(records: readonly PredictionRecord[]): string {
  const lines = ['variant_id\tscore\ttool'];
  for (const r of records) {
    lines.push(`${canonicalForm(r.variant)}\t${r.score}\t${r.tool}`);
  }
  return lines.join('\n') + '\n';
}
