/**
 * Delimiter-separated table reading shared by the prediction and label stores.
 *
 * The delimiter comes from the file extension (`.tsv` tab, `.csv` comma).
 * Headers are normalized (trimmed, leading `#` removed, lowercased) so that
 * `#CHROM` and `chrom` name the same column. Every row keeps the 1-based line
 * number it came from, for error messages.
 *
 * @module ingest/delimited-table
 */

import { readFile } from 'fs/promises';
import { extname } from 'path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { SchemaError, MalformedVariant } from '../errors/benchmark-errors.js';
import { parseVariantId, parseVariantKey } from '../variants/variant-key.js';
import type { VariantKey } from '../types/variant.js';

// ============================================================================
// Types
// ============================================================================

export interface TableRow {
  /** 1-based line number in the source file */
  line: number;
  values: Record<string, string>;
}

export interface DelimitedTable {
  /** File path or other label used in error messages */
  source: string;
  /** Normalized column names, keys of `TableRow.values` */
  columns: string[];
  /** Header cells as written (trimmed), parallel to `columns` */
  rawColumns: string[];
  rows: TableRow[];
}

/**
 * How a table identifies variants: a pre-joined id or four separate columns.
 */
export type KeyShape = 'variant_id' | 'fields';

const KEY_FIELD_COLUMNS = ['chrom', 'pos', 'ref', 'alt'] as const;

/** Accepted extensions and their delimiters. */
export const DELIMITERS: Readonly<Record<string, string>> = {
  '.tsv': '\t',
  '.csv': ',',
};

// csv-parse returns `any`; pin the shape we asked for with `info: true`.
const ParsedRecordsSchema = z.array(
  z.object({
    record: z.array(z.string()),
    info: z.object({ lines: z.number() }),
  }),
);

// csv-parse errors carry the line they stopped at as a `lines` property.
const CsvErrorLineSchema = z.object({ lines: z.number().int().positive() });

const DECIMAL_NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// ============================================================================
// Parsing
// ============================================================================

/**
 * Resolve the delimiter for a path from its extension.
 *
 * @throws {SchemaError} For extensions other than .tsv/.csv
 */
export function delimiterFor(path: string): string {
  const delimiter = DELIMITERS[extname(path).toLowerCase()];
  if (delimiter === undefined) {
    throw new SchemaError(
      `unsupported file extension "${extname(path)}" (expected .tsv or .csv)`,
      path,
    );
  }
  return delimiter;
}

export function normalizeHeader(name: string): string {
  return name.trim().replace(/^#+/, '').trim().toLowerCase();
}

/**
 * Parse delimited text into a table. Blank lines are skipped; ragged rows
 * and duplicate headers are schema errors.
 */
export function parseDelimitedText(
  text: string,
  source: string,
  delimiter: string,
): DelimitedTable {
  let raw: unknown;
  try {
    raw = parse(text, {
      delimiter,
      bom: true,
      info: true,
      skip_empty_lines: true,
      relax_quotes: false,
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    const at = CsvErrorLineSchema.safeParse(err);
    throw new SchemaError(
      `unparseable table: ${message}`,
      source,
      at.success ? at.data.lines : undefined,
    );
  }

  const parsed = ParsedRecordsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SchemaError('unexpected parser output', source);
  }

  const [header, ...body] = parsed.data;
  if (!header) {
    return { source, columns: [], rawColumns: [], rows: [] };
  }

  const rawColumns = header.record.map((h) => h.trim());
  const columns = rawColumns.map(normalizeHeader);
  const seen = new Set<string>();
  for (const column of columns) {
    if (seen.has(column)) {
      throw new SchemaError(`duplicate column "${column}"`, source, header.info.lines);
    }
    seen.add(column);
  }

  const rows = body.map(({ record, info }) => {
    const values: Record<string, string> = {};
    columns.forEach((column, i) => {
      values[column] = record[i].trim();
    });
    return { line: info.lines, values };
  });

  return { source, columns, rawColumns, rows };
}

/**
 * Read and parse a .tsv/.csv file.
 */
export async function readDelimitedTable(path: string): Promise<DelimitedTable> {
  const delimiter = delimiterFor(path);
  const text = await readFile(path, 'utf-8');
  return parseDelimitedText(text, path, delimiter);
}

// ============================================================================
// Column helpers
// ============================================================================

/**
 * Ensure the given columns are present.
 *
 * @throws {SchemaError} Naming every missing column
 */
export function requireColumns(table: DelimitedTable, required: readonly string[]): void {
  const missing = required.filter((c) => !table.columns.includes(c));
  if (missing.length > 0) {
    throw new SchemaError(
      `missing required column(s): ${missing.join(', ')} (found: ${table.columns.join(', ') || 'none'})`,
      table.source,
    );
  }
}

/**
 * Detect the key shape. `variant_id` wins when both shapes are present.
 *
 * @throws {SchemaError} When neither shape is complete
 */
export function resolveKeyShape(table: DelimitedTable): KeyShape {
  if (table.columns.includes('variant_id')) return 'variant_id';
  if (KEY_FIELD_COLUMNS.every((c) => table.columns.includes(c))) return 'fields';
  throw new SchemaError(
    'expected a variant_id column or chrom, pos, ref and alt columns',
    table.source,
  );
}

/**
 * Build the variant key of a row; a malformed key aborts the whole file.
 *
 * @throws {SchemaError} Wrapping the MalformedVariant with file and row
 */
export function variantKeyFromRow(
  table: DelimitedTable,
  row: TableRow,
  shape: KeyShape,
): VariantKey {
  const v = row.values;
  try {
    return shape === 'variant_id'
      ? parseVariantId(v.variant_id)
      : parseVariantKey(v.chrom, v.pos, v.ref, v.alt);
  } catch (err) {
    if (err instanceof MalformedVariant) {
      throw new SchemaError(`malformed variant: ${err.message}`, table.source, row.line);
    }
    throw err;
  }
}

/**
 * Parse a finite decimal number (plain or exponent notation).
 *
 * @throws {SchemaError} On blanks, hex, NaN, Infinity and other junk
 */
export function parseFiniteNumber(
  raw: string,
  column: string,
  table: DelimitedTable,
  row: TableRow,
): number {
  const text = raw.trim();
  if (!DECIMAL_NUMBER.test(text)) {
    throw new SchemaError(`${column} "${raw}" is not a finite number`, table.source, row.line);
  }
  const value = Number(text);
  if (!Number.isFinite(value)) {
    throw new SchemaError(`${column} "${raw}" is not a finite number`, table.source, row.line);
  }
  return value;
}
