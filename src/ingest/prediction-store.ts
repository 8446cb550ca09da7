/**
 * Store for external tool score submissions.
 *
 * Accepts any number of .tsv/.csv files with either
 * `variant_id,score,tool` or `chrom,pos,ref,alt,score,tool` columns and
 * normalizes them into one table keyed by tool and canonical variant id.
 *
 * Repeated (variant, tool) pairs, within one file or across files, are
 * collapsed to the arithmetic mean of every observation. All observations are
 * kept until the mean is taken so that the result does not depend on file or
 * row order beyond summation order.
 *
 * Any bad row aborts the whole load: a partially parsed submission is never
 * evaluated.
 */
import { mean } from 'simple-statistics';
import {
  readDelimitedTable,
  requireColumns,
  resolveKeyShape,
  variantKeyFromRow,
  parseFiniteNumber,
  type DelimitedTable,
} from './delimited-table.js';
import { SchemaError } from '../errors/benchmark-errors.js';
import { canonicalForm } from '../variants/variant-key.js';
import type { PredictionRecord, ScoredVariant, VariantKey } from '../types/variant.js';

interface Observations {
  variant: VariantKey;
  scores: number[];
}

export class PredictionStore {
  private readonly effective = new Map<string, Map<string, ScoredVariant>>();

  private constructor(
    observed: Map<string, Map<string, Observations>>,
    /** Total raw rows across all inputs */
    readonly rowCount: number,
    /** Paths or labels of the inputs, in load order */
    readonly sources: readonly string[],
  ) {
    for (const [tool, byVariant] of observed) {
      const scored = new Map<string, ScoredVariant>();
      for (const [id, obs] of byVariant) {
        scored.set(id, {
          variant: obs.variant,
          score: mean(obs.scores),
          observations: obs.scores.length,
        });
      }
      this.effective.set(tool, scored);
    }
  }

  /**
   * Read and normalize prediction files.
   *
   * @param paths - Files in the order they should be read
   * @throws {SchemaError} On the first structural or value error
   */
  static async load(paths: readonly string[]): Promise<PredictionStore> {
    const tables: DelimitedTable[] = [];
    for (const path of paths) {
      tables.push(await readDelimitedTable(path));
    }
    return PredictionStore.fromTables(tables);
  }

  /**
   * Build a store from already parsed tables (no I/O).
   */
  static fromTables(tables: readonly DelimitedTable[]): PredictionStore {
    const records: PredictionRecord[] = [];
    for (const table of tables) {
      records.push(...readPredictionRows(table));
    }
    return PredictionStore.fromRecords(
      records,
      tables.map((t) => t.source),
    );
  }

  /**
   * Build a store from in-memory records, e.g. generated baselines.
   */
  static fromRecords(
    records: readonly PredictionRecord[],
    sources: readonly string[] = [],
  ): PredictionStore {
    const observed = new Map<string, Map<string, Observations>>();
    for (const { variant, tool, score } of records) {
      let byVariant = observed.get(tool);
      if (!byVariant) {
        byVariant = new Map();
        observed.set(tool, byVariant);
      }
      const id = canonicalForm(variant);
      const existing = byVariant.get(id);
      if (existing) {
        existing.scores.push(score);
      } else {
        byVariant.set(id, { variant, scores: [score] });
      }
    }
    return new PredictionStore(observed, records.length, sources);
  }

  /**
   * Tool names in first-seen order.
   */
  tools(): string[] {
    return [...this.effective.keys()];
  }

  /**
   * Effective scores for a tool keyed by canonical variant id, in order of
   * first appearance. Empty for unknown tools.
   */
  scoresFor(tool: string): ReadonlyMap<string, ScoredVariant> {
    return this.effective.get(tool) ?? new Map<string, ScoredVariant>();
  }

  /**
   * Effective score of one (tool, variant) pair.
   */
  scoreOf(tool: string, key: VariantKey): number | undefined {
    return this.effective.get(tool)?.get(canonicalForm(key))?.score;
  }

  /**
   * Raw rows that contributed to a (tool, variant) score; 0 when unscored.
   */
  observationCount(tool: string, key: VariantKey): number {
    return this.effective.get(tool)?.get(canonicalForm(key))?.observations ?? 0;
  }

  get isEmpty(): boolean {
    return this.effective.size === 0;
  }
}

/**
 * Validate and convert the rows of one prediction table.
 */
export function readPredictionRows(table: DelimitedTable): PredictionRecord[] {
  const shape = resolveKeyShape(table);
  requireColumns(table, ['score', 'tool']);

  return table.rows.map((row) => {
    const variant = variantKeyFromRow(table, row, shape);
    const score = parseFiniteNumber(row.values.score, 'score', table, row);
    const tool = row.values.tool;
    if (!tool) {
      throw new SchemaError('tool is empty', table.source, row.line);
    }
    return { variant, tool, score };
  });
}
