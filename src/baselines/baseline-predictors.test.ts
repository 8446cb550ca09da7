import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  loadVariantTable,
  positionSineBaseline,
  randomBaseline,
  writeBaselineFiles,
} from './baseline-predictors.js';
import { mulberry32 } from '../metrics/bootstrap.js';
import { PredictionStore } from '../ingest/prediction-store.js';
import { EmptyDatasetError } from '../errors/benchmark-errors.js';
import { parseVariantId } from '../variants/variant-key.js';

const VARIANTS = [parseVariantId('1:1000:A:G'), parseVariantId('2:0500:C:T'), parseVariantId('X:42:G:A')];

describe('randomBaseline', () => {
  it('draws one seeded score per variant in order', () => {
    const rng = mulberry32(7);
    const expected = [rng(), rng(), rng()];

    const records = randomBaseline(VARIANTS, 7);

    expect(records.map((r) => r.score)).toEqual(expected);
    expect(records.every((r) => r.tool === 'random_baseline')).toBe(true);
    expect(records.map((r) => r.variant)).toEqual(VARIANTS);
  });

  it('is reproducible for a seed', () => {
    expect(randomBaseline(VARIANTS, 3)).toEqual(randomBaseline(VARIANTS, 3));
  });
});

describe('positionSineBaseline', () => {
  it('scores (sin(pos/1000)+1)/2', () => {
    const records = positionSineBaseline(VARIANTS);

    expect(records[0].score).toBe((Math.sin(1) + 1) / 2);
    expect(records[1].score).toBe((Math.sin(0.5) + 1) / 2);
    expect(records[0].tool).toBe('pos_sine_baseline');
  });

  it('stays within [0,1]', () => {
    for (const { score } of positionSineBaseline(VARIANTS)) {
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(1);
    }
  });
});

describe('file helpers', () => {
  const testDir = join(tmpdir(), `baselines-test-${Date.now()}`);

  beforeEach(async () => {
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('loads distinct variants from a label-style table', async () => {
    const path = join(testDir, 'labels.tsv');
    await writeFile(path, 'variant_id\tlabel\nchr1:1000:a:g\t1\n1:1000:A:G\t1\n2:500:C:T\t0\n', 'utf-8');

    const variants = await loadVariantTable(path);

    expect(variants).toEqual([parseVariantId('1:1000:A:G'), parseVariantId('2:500:C:T')]);
  });

  it('rejects an empty variant table', async () => {
    const path = join(testDir, 'empty.csv');
    await writeFile(path, 'chrom,pos,ref,alt\n', 'utf-8');

    await expect(loadVariantTable(path)).rejects.toThrow(EmptyDatasetError);
  });

  it('writes prediction files the prediction store can read', async () => {
    const outDir = join(testDir, 'baselines');

    const paths = await writeBaselineFiles(VARIANTS, outDir, 5);

    expect(paths).toEqual([join(outDir, 'random_baseline.tsv'), join(outDir, 'pos_sine_baseline.tsv')]);
    const firstLine = (await readFile(paths[1], 'utf-8')).split('\n')[1];
    expect(firstLine).toBe(`1:1000:A:G\t${(Math.sin(1) + 1) / 2}\tpos_sine_baseline`);

    const store = await PredictionStore.load(paths);
    expect(store.tools()).toEqual(['random_baseline', 'pos_sine_baseline']);
    expect(store.scoreOf('random_baseline', VARIANTS[2])).toBe(randomBaseline(VARIANTS, 5)[2].score);
  });
});
