import { describe, it, expect } from 'vitest';
import { align } from './aligner.js';
import { PredictionStore } from '../ingest/prediction-store.js';
import { LabelStore } from '../ingest/label-store.js';
import { parseVariantId } from '../variants/variant-key.js';
import type { BinaryLabel } from '../types/variant.js';

const predictions = (rows: Array<[string, number, string]>) =>
  PredictionStore.fromRecords(
    rows.map(([id, score, tool]) => ({ variant: parseVariantId(id), score, tool })),
  );

const labels = (rows: Array<[string, BinaryLabel]>) =>
  LabelStore.fromRecords(rows.map(([id, label]) => ({ variant: parseVariantId(id), label })));

describe('align', () => {
  it('emits matched pairs in label order', () => {
    const result = align(
      predictions([
        ['1:3:A:G', 0.3, 'T'],
        ['1:1:A:G', 0.1, 'T'],
        ['1:2:A:G', 0.2, 'T'],
      ]),
      labels([
        ['1:2:A:G', 1],
        ['1:1:A:G', 0],
        ['1:3:A:G', 1],
      ]),
    );

    expect(result.datasets.get('T')?.pairs).toEqual([
      { variantId: '1:2:A:G', score: 0.2, label: 1 },
      { variantId: '1:1:A:G', score: 0.1, label: 0 },
      { variantId: '1:3:A:G', score: 0.3, label: 1 },
    ]);
  });

  it('drops unscored and unlabeled variants and reports coverage', () => {
    const result = align(
      predictions([
        ['1:1:A:G', 0.1, 'T'],
        ['1:9:A:G', 0.9, 'T'],
      ]),
      labels([
        ['1:1:A:G', 0],
        ['1:2:A:G', 1],
        ['1:3:A:G', 1],
      ]),
    );

    expect(result.datasets.get('T')?.pairs).toHaveLength(1);
    expect(result.coverage.get('T')).toEqual({ nScored: 2, nLabeled: 3, nMatched: 1 });
    expect(result.errors).toEqual([]);
  });

  it('records NoOverlapError for a tool with zero matches without affecting others', () => {
    const result = align(
      predictions([
        ['1:1:A:G', 0.1, 'Good'],
        ['2:1:A:G', 0.5, 'Elsewhere'],
      ]),
      labels([['1:1:A:G', 0]]),
    );

    expect(result.coverage.get('Elsewhere')).toEqual({ nScored: 1, nLabeled: 1, nMatched: 0 });
    expect(result.datasets.get('Elsewhere')?.pairs).toEqual([]);
    expect(result.datasets.get('Good')?.pairs).toHaveLength(1);
    expect(result.errors).toEqual([
      {
        tool: 'Elsewhere',
        kind: 'NoOverlapError',
        message: 'none of 1 scored variant(s) appear among 1 labeled variant(s)',
      },
    ]);
  });
});
