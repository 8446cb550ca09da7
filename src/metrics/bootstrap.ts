/**
 * Seeded percentile bootstrap.
 *
 * Resampling is at the variant level: one draw is a list of `n` indices
 * drawn with replacement, and every metric of that draw is computed from the
 * same indices. The generator is mulberry32 seeded per tool from
 * SHA-256(`<baseSeed>:<tool>`), so a tool's draws do not depend on which
 * other tools are evaluated or in what order.
 *
 * Index k of a draw is `floor(u_k * n)` where u_k is the k-th output of the
 * generator; any implementation following that recipe reproduces the draws.
 */
import { createHash } from 'crypto';
import { quantileSorted } from 'simple-statistics';
import type { Interval } from '../types/evaluation.js';

export type Rng = () => number;

/**
 * mulberry32: 32-bit state PRNG returning floats in [0, 1).
 */
export function mulberry32(seed: number): Rng {
  let t = seed >>> 0;
  return () => {
    t = (t + 0x6d2b79f5) >>> 0;
    let r = Math.imul(t ^ (t >>> 15), t | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Per-tool seed: the first 32 bits of SHA-256(`<baseSeed>:<tool>`).
 */
export function deriveSeed(baseSeed: number, tool: string): number {
  const digest = createHash('sha256').update(`${baseSeed}:${tool}`).digest('hex');
  return Number.parseInt(digest.slice(0, 8), 16);
}

/**
 * One bootstrap draw of `n` indices in [0, n).
 */
export function drawIndices(rng: Rng, n: number): number[] {
  const indices = new Array<number>(n);
  for (let i = 0; i < n; i++) {
    indices[i] = Math.floor(rng() * n);
  }
  return indices;
}

/**
 * Two-sided percentile interval at `level` (e.g. 0.95 → 2.5th/97.5th).
 *
 * Percentiles use linear interpolation between order statistics
 * (Hyndman-Fan type 7): the p-th percentile of n sorted values sits at
 * 0-based position `(n - 1) * p`.
 */
export function percentileInterval(samples: readonly number[], level: number): Interval {
  const sorted = [...samples].sort((a, b) => a - b);
  const alpha = (1 - level) / 2;
  return {
    low: quantileSorted(sorted, alpha),
    high: quantileSorted(sorted, 1 - alpha),
  };
}

export interface BootstrapOptions {
  draws: number;
  level: number;
  seed: number;
}

export interface BootstrapResult<K extends string> {
  intervals: Partial<Record<K, Interval>>;
  /** Draws in which a metric came out NaN and was left out */
  skippedDraws: Partial<Record<K, number>>;
}

/**
 * Bootstrap every metric whose point estimate is finite.
 *
 * Draws where a metric is undefined (e.g. a single-class resample for AUROC)
 * are skipped for that metric only. The percentile interval is widened to
 * include the point estimate, so `low <= point <= high` always holds.
 *
 * @param n - Dataset size
 * @param metrics - Metrics to bootstrap
 * @param statistic - Computes every metric from one draw's indices
 * @param point - Point estimates on the full dataset
 */
export function bootstrapIntervals<K extends string>(
  n: number,
  metrics: readonly K[],
  statistic: (indices: readonly number[]) => Record<K, number>,
  point: Record<K, number>,
  options: BootstrapOptions,
): BootstrapResult<K> {
  const keys = metrics.filter((k) => Number.isFinite(point[k]));
  const samples = new Map<K, number[]>(keys.map((k) => [k, []]));
  const skippedDraws: Partial<Record<K, number>> = {};

  const rng = mulberry32(options.seed);
  for (let draw = 0; draw < options.draws; draw++) {
    const values = statistic(drawIndices(rng, n));
    for (const key of keys) {
      const value = values[key];
      if (Number.isFinite(value)) {
        samples.get(key)?.push(value);
      } else {
        skippedDraws[key] = (skippedDraws[key] ?? 0) + 1;
      }
    }
  }

  const intervals: Partial<Record<K, Interval>> = {};
  for (const [key, values] of samples) {
    if (values.length === 0) continue;
    const { low, high } = percentileInterval(values, options.level);
    intervals[key] = {
      low: Math.min(low, point[key]),
      high: Math.max(high, point[key]),
    };
  }

  return { intervals, skippedDraws };
}
