import { describe, it, expect } from 'vitest';
import {
  bootstrapIntervals,
  deriveSeed,
  drawIndices,
  mulberry32,
  percentileInterval,
} from './bootstrap.js';

const VALUES = Array.from({ length: 20 }, (_, i) => i + 1);

function meanAt(indices: readonly number[]): number {
  return indices.reduce((sum, i) => sum + VALUES[i], 0) / indices.length;
}

describe('mulberry32', () => {
  it('repeats its sequence for the same seed', () => {
    const a = mulberry32(7);
    const b = mulberry32(7);
    const seqA = [a(), a(), a(), a()];
    const seqB = [b(), b(), b(), b()];
    expect(seqA).toEqual(seqB);
  });

  it('produces different sequences for different seeds', () => {
    expect(mulberry32(1)()).not.toBe(mulberry32(2)());
  });

  it('stays within [0, 1)', () => {
    const rng = mulberry32(123);
    for (let i = 0; i < 1000; i++) {
      const u = rng();
      expect(u).toBeGreaterThanOrEqual(0);
      expect(u).toBeLessThan(1);
    }
  });
});

describe('deriveSeed', () => {
  it('is stable for a base seed and tool', () => {
    expect(deriveSeed(42, 'toolA')).toBe(deriveSeed(42, 'toolA'));
  });

  it('differs between tools and base seeds', () => {
    expect(deriveSeed(42, 'toolA')).not.toBe(deriveSeed(42, 'toolB'));
    expect(deriveSeed(42, 'toolA')).not.toBe(deriveSeed(43, 'toolA'));
  });

  it('is an unsigned 32-bit integer', () => {
    const seed = deriveSeed(0, 'x');
    expect(Number.isInteger(seed)).toBe(true);
    expect(seed).toBeGreaterThanOrEqual(0);
    expect(seed).toBeLessThanOrEqual(0xffffffff);
  });
});

describe('drawIndices', () => {
  it('draws n indices in [0, n)', () => {
    const indices = drawIndices(mulberry32(5), 30);
    expect(indices).toHaveLength(30);
    expect(indices.every((i) => Number.isInteger(i) && i >= 0 && i < 30)).toBe(true);
  });
});

describe('percentileInterval', () => {
  it('interpolates the 2.5th and 97.5th percentiles at level 0.95', () => {
    // positions 99 * 0.025 = 2.475 and 99 * 0.975 = 96.525
    const samples = Array.from({ length: 100 }, (_, i) => i + 1);
    const { low, high } = percentileInterval(samples, 0.95);
    expect(low).toBeCloseTo(3.475, 10);
    expect(high).toBeCloseTo(97.525, 10);
  });

  it('interpolates between two values', () => {
    const { low, high } = percentileInterval([0, 10], 0.9);
    expect(low).toBeCloseTo(0.5, 10);
    expect(high).toBeCloseTo(9.5, 10);
  });

  it('does not depend on input order', () => {
    const samples = Array.from({ length: 100 }, (_, i) => 100 - i);
    const { low, high } = percentileInterval(samples, 0.95);
    expect(low).toBeCloseTo(3.475, 10);
    expect(high).toBeCloseTo(97.525, 10);
  });
});

describe('bootstrapIntervals', () => {
  const options = { draws: 200, level: 0.95, seed: 99 };

  it('brackets the point estimate', () => {
    const point = { mean: 10.5 };
    const { intervals } = bootstrapIntervals(
      VALUES.length,
      ['mean'],
      (indices) => ({ mean: meanAt(indices) }),
      point,
      options,
    );

    const interval = intervals.mean;
    expect(interval).toBeDefined();
    expect(interval?.low).toBeLessThanOrEqual(10.5);
    expect(interval?.high).toBeGreaterThanOrEqual(10.5);
    expect(interval?.low).toBeGreaterThanOrEqual(1);
    expect(interval?.high).toBeLessThanOrEqual(20);
  });

  it('is reproducible for a fixed seed', () => {
    const run = () =>
      bootstrapIntervals(
        VALUES.length,
        ['mean'],
        (indices) => ({ mean: meanAt(indices) }),
        { mean: 10.5 },
        options,
      );
    expect(run()).toEqual(run());
  });

  it('widens the interval to include the point estimate', () => {
    const { intervals } = bootstrapIntervals(
      10,
      ['constant'],
      () => ({ constant: 5 }),
      { constant: 7 },
      options,
    );
    expect(intervals.constant).toEqual({ low: 5, high: 7 });
  });

  it('skips undefined draws per metric', () => {
    const { intervals, skippedDraws } = bootstrapIntervals(
      10,
      ['defined', 'never'],
      () => ({ defined: 1, never: NaN }),
      { defined: 1, never: 0.5 },
      options,
    );
    expect(intervals.defined).toEqual({ low: 1, high: 1 });
    expect(intervals.never).toBeUndefined();
    expect(skippedDraws).toEqual({ never: 200 });
  });

  it('does not bootstrap a metric whose point estimate is undefined', () => {
    let calls = 0;
    const { intervals, skippedDraws } = bootstrapIntervals(
      10,
      ['m'],
      () => {
        calls++;
        return { m: NaN };
      },
      { m: NaN },
      { ...options, draws: 3 },
    );
    expect(intervals).toEqual({});
    expect(skippedDraws).toEqual({});
    expect(calls).toBe(3);
  });
});
