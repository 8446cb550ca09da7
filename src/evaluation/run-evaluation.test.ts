import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { compareMetricsRecords, evaluate, runEvaluation } from './run-evaluation.js';
import { PredictionStore } from '../ingest/prediction-store.js';
import { LabelStore } from '../ingest/label-store.js';
import { parseVariantId } from '../variants/variant-key.js';
import { ConfigError, EmptyDatasetError, SchemaError } from '../errors/benchmark-errors.js';
import type { BinaryLabel, PredictionRecord } from '../types/variant.js';

const V1 = '1:100:A:G';
const V2 = '1:200:C:T';

function predictions(rows: Array<[string, number, string]>): PredictionStore {
  const records: PredictionRecord[] = rows.map(([id, score, tool]) => ({
    variant: parseVariantId(id),
    score,
    tool,
  }));
  return PredictionStore.fromRecords(records);
}

function labels(rows: Array<[string, BinaryLabel]>): LabelStore {
  return LabelStore.fromRecords(rows.map(([id, label]) => ({ variant: parseVariantId(id), label })));
}

describe('evaluate', () => {
  it('ranks a perfectly separating tool at AUROC 1', () => {
    const result = evaluate(
      predictions([
        [V1, 0.9, 'T'],
        [V2, 0.1, 'T'],
      ]),
      labels([
        [V1, 1],
        [V2, 0],
      ]),
    );

    expect(result.metrics).toHaveLength(1);
    expect(result.metrics[0].tool).toBe('T');
    expect(result.metrics[0].auroc).toBe(1);
    expect(result.errors).toEqual([]);
    expect(result.nLabels).toBe(2);
  });

  it('evaluates averaged duplicate scores', () => {
    const result = evaluate(
      predictions([
        [V1, 0.8, 'T'],
        [V1, 0.6, 'T'],
        [V2, 0.1, 'T'],
      ]),
      labels([
        [V1, 1],
        [V2, 0],
      ]),
    );

    expect(result.coverage.get('T')).toEqual({ nScored: 2, nLabeled: 2, nMatched: 2 });
    // (0.7 - 1)^2 and (0.1 - 0)^2
    expect(result.metrics[0].brier).toBeCloseTo((0.09 + 0.01) / 2, 12);
  });

  it('records UndefinedMetricError for single-class labels but keeps Brier', () => {
    const result = evaluate(
      predictions([
        [V1, 0.9, 'T'],
        [V2, 0.4, 'T'],
      ]),
      labels([
        [V1, 1],
        [V2, 1],
      ]),
    );

    expect(result.errors).toEqual([
      {
        tool: 'T',
        kind: 'UndefinedMetricError',
        message: 'auroc, auprc undefined: labels are single-class (2 positive, 0 negative)',
      },
    ]);
    expect(result.metrics[0].auroc).toBeNaN();
    expect(result.metrics[0].auprc).toBeNaN();
    expect(result.metrics[0].brier).toBeCloseTo((0.01 + 0.36) / 2, 12);
  });

  it('reports a tool without overlap in coverage and errors only', () => {
    const result = evaluate(
      predictions([
        [V1, 0.9, 'T'],
        [V2, 0.1, 'T'],
        ['2:500:G:A', 0.5, 'U'],
      ]),
      labels([
        [V1, 1],
        [V2, 0],
      ]),
    );

    expect(result.coverage.get('U')).toEqual({ nScored: 1, nLabeled: 2, nMatched: 0 });
    expect(result.errors).toEqual([
      {
        tool: 'U',
        kind: 'NoOverlapError',
        message: 'none of 1 scored variant(s) appear among 2 labeled variant(s)',
      },
    ]);
    expect(result.metrics.map((m) => m.tool)).toEqual(['T']);
  });

  it('sorts by AUROC, then tool name', () => {
    const result = evaluate(
      predictions([
        [V1, 0.1, 'C'],
        [V2, 0.9, 'C'],
        [V1, 0.9, 'B'],
        [V2, 0.1, 'B'],
        [V1, 0.8, 'A'],
        [V2, 0.2, 'A'],
      ]),
      labels([
        [V1, 1],
        [V2, 0],
      ]),
    );

    expect(result.metrics.map((m) => [m.tool, m.auroc])).toEqual([
      ['A', 1],
      ['B', 1],
      ['C', 0],
    ]);
  });

  it('throws EmptyDatasetError when there are no predictions', () => {
    expect(() => evaluate(predictions([]), labels([[V1, 1]]))).toThrow(EmptyDatasetError);
    expect(() => evaluate(predictions([]), labels([[V1, 1]]))).toThrow(
      'predictions: no prediction rows to evaluate',
    );
  });

  it('rejects an invalid config', () => {
    expect(() =>
      evaluate(predictions([[V1, 0.9, 'T']]), labels([[V1, 1]]), { bootstrapDraws: 0 }),
    ).toThrow(ConfigError);
  });

  it('returns the resolved config', () => {
    const result = evaluate(predictions([[V1, 0.9, 'T']]), labels([[V1, 1]]), {
      randomSeed: 7,
    });
    expect(result.config.randomSeed).toBe(7);
    expect(result.config.bootstrapDraws).toBe(1000);
  });

  it('is reproducible for the same inputs and seed', () => {
    const rows: Array<[string, number, string]> = [];
    const truth: Array<[string, BinaryLabel]> = [];
    for (let i = 1; i <= 60; i++) {
      const id = `3:${i * 10}:A:C`;
      const label: BinaryLabel = i % 3 === 0 ? 1 : 0;
      truth.push([id, label]);
      rows.push([id, label === 1 ? 0.4 + (i % 7) / 20 : 0.1 + (i % 11) / 20, 'T']);
    }
    const config = { bootstrapDraws: 100, randomSeed: 11 };

    const first = evaluate(predictions(rows), labels(truth), config);
    const second = evaluate(predictions(rows), labels(truth), config);

    expect(first.metrics[0].ci.status).toBe('computed');
    expect(first).toEqual(second);
  });
});

describe('compareMetricsRecords', () => {
  it('places undefined AUROC last', () => {
    const { metrics } = evaluate(
      predictions([
        [V1, 0.9, 'T'],
        [V2, 0.1, 'T'],
      ]),
      labels([
        [V1, 1],
        [V2, 0],
      ]),
    );
    const defined = metrics[0];
    const undefinedAuroc = { ...defined, tool: 'A', auroc: NaN, auprc: NaN };

    expect([undefinedAuroc, defined].sort(compareMetricsRecords).map((m) => m.tool)).toEqual([
      'T',
      'A',
    ]);
  });
});

describe('runEvaluation', () => {
  const testDir = join(tmpdir(), `run-evaluation-test-${Date.now()}`);

  beforeEach(async () => {
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  const write = async (name: string, content: string): Promise<string> => {
    const path = join(testDir, name);
    await writeFile(path, content, 'utf-8');
    return path;
  };

  it('loads files and evaluates them', async () => {
    const labelPath = await write('labels.tsv', 'chrom\tpos\tref\talt\tlabel\nchr1\t100\ta\tg\t1\n1\t200\tC\tT\t0\n');
    const first = await write('a.tsv', 'variant_id\tscore\ttool\n1:100:A:G\t0.9\tT\n');
    const second = await write('b.csv', 'variant_id,score,tool\n1:200:C:T,0.1,T\n');

    const result = await runEvaluation([first, second], labelPath, { threshold: 0.6 });

    expect(result.metrics).toHaveLength(1);
    expect(result.metrics[0]).toMatchObject({
      tool: 'T',
      n: 2,
      auroc: 1,
      threshold: { value: 0.6, source: 'configured' },
    });
  });

  it('aborts on a malformed prediction file', async () => {
    const labelPath = await write('labels.tsv', 'variant_id\tlabel\n1:100:A:G\t1\n');
    const bad = await write('bad.tsv', 'variant_id\tscore\ttool\n1:100:A:G\thigh\tT\n');

    await expect(runEvaluation([bad], labelPath)).rejects.toThrow(SchemaError);
  });

  it('aborts when the label file has no rows', async () => {
    const labelPath = await write('labels.tsv', 'variant_id\tlabel\n');
    const preds = await write('a.tsv', 'variant_id\tscore\ttool\n1:100:A:G\t0.9\tT\n');

    await expect(runEvaluation([preds], labelPath)).rejects.toThrow(EmptyDatasetError);
  });
});
