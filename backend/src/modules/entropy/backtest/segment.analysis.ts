/**
 * Forward returns grouped by indicator quantile bucket.
 * Descriptive only: bucket edges come from the same sample they describe.
 */

import type { EntropyBucket, IndicatorPoint } from '../entropy.types.js';
import { correlation, mean, percentile } from '../utils/statistics.js';

export interface BucketSpec {
  label: string;
  lower: number; // quantile in [0, 1]
  upper: number;
}

export const DEFAULT_BUCKETS: readonly BucketSpec[] = [
  { label: 'low (0-20%)', lower: 0, upper: 0.2 },
  { label: 'mid (20-80%)', lower: 0.2, upper: 0.8 },
  { label: 'high (80-100%)', lower: 0.8, upper: 1 },
];

export function bucketForwardReturns(
  points: readonly IndicatorPoint[],
  forward: ReadonlyMap<string, number>,
  buckets: readonly BucketSpec[] = DEFAULT_BUCKETS
): EntropyBucket[] {
  const samples: { value: number; ret: number }[] = [];
  for (const p of points) {
    const ret = forward.get(p.date);
    if (p.value === null || ret === undefined) continue;
    samples.push({ value: p.value, ret });
  }
  if (samples.length === 0) return [];

  const values = samples.map(s => s.value);
  return buckets.map((b, idx) => {
    const lowerValue = percentile(values, b.lower * 100);
    const upperValue = percentile(values, b.upper * 100);
    const last = idx === buckets.length - 1;
    const rets = samples
      .filter(s => s.value >= lowerValue && (last ? s.value <= upperValue : s.value < upperValue))
      .map(s => s.ret);

    return {
      label: b.label,
      lowerQuantile: b.lower,
      upperQuantile: b.upper,
      lowerValue,
      upperValue,
      sampleSize: rets.length,
      meanReturn: rets.length ? mean(rets) : null,
      winRate: rets.length ? rets.filter(r => r > 0).length / rets.length : null,
    };
  });
}

/**
 * Pearson correlation of indicator values with forward returns, over the
 * dates that have both.
 */
export function forwardCorrelation(
  points: readonly IndicatorPoint[],
  forward: ReadonlyMap<string, number>
): { correlation: number | null; sampleSize: number } {
  const xs: number[] = [];
  const ys: number[] = [];
  for (const p of points) {
    const ret = forward.get(p.date);
    if (p.value === null || ret === undefined) continue;
    xs.push(p.value);
    ys.push(ret);
  }
  return { correlation: correlation(xs, ys), sampleSize: xs.length };
}
