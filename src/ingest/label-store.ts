/**
 * Store for ground-truth pathogenic/benign labels.
 *
 * One label per variant. Exact duplicate rows collapse onto the first
 * occurrence; conflicting duplicates abort the load.
 */
import {
  readDelimitedTable,
  requireColumns,
  resolveKeyShape,
  variantKeyFromRow,
  type DelimitedTable,
} from './delimited-table.js';
import { SchemaError, EmptyDatasetError } from '../errors/benchmark-errors.js';
import { canonicalForm } from '../variants/variant-key.js';
import type { BinaryLabel, LabelRecord, VariantKey } from '../types/variant.js';

interface StoredLabel extends LabelRecord {
  line: number;
}

export class LabelStore {
  private constructor(
    private readonly labels: ReadonlyMap<string, StoredLabel>,
    readonly source: string,
  ) {}

  /**
   * Read and validate a label file.
   *
   * @throws {SchemaError} On bad columns, labels outside {0,1}, or conflicts
   * @throws {EmptyDatasetError} When the table has no rows
   */
  static async load(path: string): Promise<LabelStore> {
    return LabelStore.fromTable(await readDelimitedTable(path));
  }

  static fromTable(table: DelimitedTable): LabelStore {
    const shape = resolveKeyShape(table);
    requireColumns(table, ['label']);

    if (table.rows.length === 0) {
      throw new EmptyDatasetError(`${table.source}: label table has zero rows`);
    }

    const labels = new Map<string, StoredLabel>();
    for (const row of table.rows) {
      const variant = variantKeyFromRow(table, row, shape);
      const label = parseLabel(row.values.label);
      if (label === null) {
        throw new SchemaError(
          `label "${row.values.label}" must be 0 or 1`,
          table.source,
          row.line,
        );
      }

      const id = canonicalForm(variant);
      const existing = labels.get(id);
      if (existing) {
        if (existing.label !== label) {
          throw new SchemaError(
            `conflicting labels for ${id} (row ${existing.line} has ${existing.label}, this row has ${label})`,
            table.source,
            row.line,
          );
        }
        continue;
      }
      labels.set(id, { variant, label, line: row.line });
    }

    return new LabelStore(labels, table.source);
  }

  /**
   * Build a store from in-memory records (no I/O).
   */
  static fromRecords(records: readonly LabelRecord[], source = '<memory>'): LabelStore {
    const table: DelimitedTable = {
      source,
      columns: ['variant_id', 'label'],
      rawColumns: ['variant_id', 'label'],
      rows: records.map((r, i) => ({
        line: i + 2,
        values: { variant_id: canonicalForm(r.variant), label: String(r.label) },
      })),
    };
    return LabelStore.fromTable(table);
  }

  /**
   * Labels as `[canonicalId, record]` pairs in load order.
   */
  entries(): Array<[string, LabelRecord]> {
    return [...this.labels].map(([id, { variant, label }]) => [id, { variant, label }]);
  }

  get(key: VariantKey): BinaryLabel | undefined {
    return this.labels.get(canonicalForm(key))?.label;
  }

  get size(): number {
    return this.labels.size;
  }

  get positives(): number {
    let count = 0;
    for (const { label } of this.labels.values()) {
      if (label === 1) count++;
    }
    return count;
  }

  get negatives(): number {
    return this.size - this.positives;
  }
}

function parseLabel(raw: string): BinaryLabel | null {
  const text = raw.trim();
  if (text === '0') return 0;
  if (text === '1') return 1;
  return null;
}
