import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { PredictionStore } from './prediction-store.js';
import { parseDelimitedText } from './delimited-table.js';
import { SchemaError } from '../errors/benchmark-errors.js';
import { parseVariantId } from '../variants/variant-key.js';

describe('PredictionStore', () => {
  const testDir = join(tmpdir(), `prediction-store-test-${Date.now()}`);

  beforeEach(async () => {
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  const writeTable = async (name: string, content: string): Promise<string> => {
    const path = join(testDir, name);
    await writeFile(path, content, 'utf-8');
    return path;
  };

  describe('load', () => {
    it('reads variant_id tables', async () => {
      const path = await writeTable(
        'a.tsv',
        'variant_id\tscore\ttool\n1:100:A:G\t0.9\tT\n1:200:C:T\t0.1\tT\n',
      );

      const store = await PredictionStore.load([path]);

      expect(store.tools()).toEqual(['T']);
      expect(store.rowCount).toBe(2);
      expect(store.scoreOf('T', parseVariantId('1:100:A:G'))).toBe(0.9);
      expect(store.scoreOf('T', parseVariantId('1:200:C:T'))).toBe(0.1);
    });

    it('reads chrom/pos/ref/alt tables', async () => {
      const path = await writeTable(
        'b.csv',
        'chrom,pos,ref,alt,score,tool\nchr2,50,g,a,0.3,CADD\n',
      );

      const store = await PredictionStore.load([path]);

      expect(store.scoreOf('CADD', parseVariantId('2:50:G:A'))).toBe(0.3);
    });

    it('returns an empty store for no paths', async () => {
      const store = await PredictionStore.load([]);
      expect(store.isEmpty).toBe(true);
      expect(store.tools()).toEqual([]);
    });

    it('aborts on a non-numeric score, naming file and row', async () => {
      const path = await writeTable(
        'bad.csv',
        'variant_id,score,tool\n1:100:A:G,0.9,T\n1:200:C:T,high,T\n',
      );

      const error = await PredictionStore.load([path]).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SchemaError);
      expect(error).toMatchObject({ file: path, row: 3 });
    });

    it('aborts on a missing tool column', async () => {
      const path = await writeTable('notool.csv', 'variant_id,score\n1:100:A:G,0.9\n');

      await expect(PredictionStore.load([path])).rejects.toThrow(/missing required column\(s\): tool/);
    });

    it('aborts on a malformed variant_id', async () => {
      const path = await writeTable('badkey.csv', 'variant_id,score,tool\n1-100-A-G,0.9,T\n');

      await expect(PredictionStore.load([path])).rejects.toBeInstanceOf(SchemaError);
    });

    it('aborts on an empty tool cell', async () => {
      const path = await writeTable('blank.csv', 'variant_id,score,tool\n1:100:A:G,0.9,\n');

      await expect(PredictionStore.load([path])).rejects.toThrow('tool is empty');
    });
  });

  describe('deduplication', () => {
    it('averages duplicates within a file', async () => {
      const path = await writeTable(
        'dup.csv',
        'variant_id,score,tool\n1:100:A:G,0.8,T\n1:100:A:G,0.6,T\n',
      );

      const store = await PredictionStore.load([path]);
      const scored = store.scoresFor('T').get('1:100:A:G');

      expect(scored?.score).toBe(0.7);
      expect(scored?.observations).toBe(2);
      expect(store.observationCount('T', parseVariantId('1:100:A:G'))).toBe(2);
      expect(store.observationCount('T', parseVariantId('1:999:A:G'))).toBe(0);
    });

    it('averages duplicates across files for the same tool', async () => {
      const a = await writeTable('a.csv', 'variant_id,score,tool\n1:100:A:G,0.25,T\n');
      const b = await writeTable('b.csv', 'variant_id,score,tool\nchr1:100:a:g,0.5,T\n1:100:A:G,0.75,T\n');

      const store = await PredictionStore.load([a, b]);

      expect(store.scoreOf('T', parseVariantId('1:100:A:G'))).toBe(0.5);
      expect(store.scoresFor('T').size).toBe(1);
    });

    it('keeps tools separate', () => {
      const table = parseDelimitedText(
        'variant_id,score,tool\n1:100:A:G,0.2,A\n1:100:A:G,0.4,B\n',
        'mem.csv',
        ',',
      );

      const store = PredictionStore.fromTables([table]);

      expect(store.tools()).toEqual(['A', 'B']);
      expect(store.scoreOf('A', parseVariantId('1:100:A:G'))).toBe(0.2);
      expect(store.scoreOf('B', parseVariantId('1:100:A:G'))).toBe(0.4);
    });

    it('equals the arithmetic mean of k observations', () => {
      const scores = [0.125, 0.5, 0.875, 0.25];
      const variant = parseVariantId('3:30:T:C');
      const store = PredictionStore.fromRecords(scores.map((score) => ({ variant, tool: 'T', score })));

      expect(store.scoreOf('T', variant)).toBe(0.4375);
    });
  });
});
