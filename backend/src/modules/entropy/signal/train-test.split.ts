/**
 * ENTROPY MODULE — Train / Evaluation Split
 *
 * The only way to obtain a TrainingSlice or an EvaluationSlice. Thresholds
 * are fitted on the former, signals generated on the latter, and the two
 * ranges never touch.
 */

import type {
  DateRange,
  EntropySeries,
  EvaluationSlice,
  IndicatorPoint,
  PriceSeries,
  TrainingSlice,
} from '../entropy.types.js';
import { LookaheadViolationError } from '../entropy.errors.js';
import { inRange } from '../utils/dates.js';

export interface SplitRanges {
  training: DateRange;
  testing: DateRange;
}

export interface SplitResult {
  training: TrainingSlice;
  evaluation: EvaluationSlice;
}

export function assertDisjoint(training: DateRange, testing: DateRange): void {
  if (training.to >= testing.from) {
    throw new LookaheadViolationError(
      `Training range ${training.from}..${training.to} overlaps or follows testing range starting ${testing.from}`,
      { training, testing }
    );
  }
}

function byDate(a: IndicatorPoint, b: IndicatorPoint): number {
  return a.date < b.date ? -1 : a.date > b.date ? 1 : 0;
}

function slice(points: readonly IndicatorPoint[], range: DateRange): IndicatorPoint[] {
  return points
    .filter(p => inRange(p.date, range))
    .map(p => ({ date: p.date, value: p.value }))
    .sort(byDate);
}

export function splitTrainTest(points: readonly IndicatorPoint[], ranges: SplitRanges): SplitResult {
  assertDisjoint(ranges.training, ranges.testing);
  return {
    training: { kind: 'training', range: { ...ranges.training }, points: slice(points, ranges.training) },
    evaluation: { kind: 'evaluation', range: { ...ranges.testing }, points: slice(points, ranges.testing) },
  };
}

/** Invalid entropy dates become gaps. */
export function entropyIndicator(series: EntropySeries): IndicatorPoint[] {
  return series.points.map(p => ({ date: p.date, value: p.valid ? p.value : null }));
}

/** Price levels as an indicator, e.g. a volatility index. */
export function priceIndicator(series: PriceSeries): IndicatorPoint[] {
  return series.points.map(p => ({ date: p.date, value: p.adjustedClose }));
}

/**
 * S(t) - S(t - lag), counted in indicator positions. A gap at either end
 * gives a gap, and so do the first `lag` positions.
 */
export function entropyChangeIndicator(points: readonly IndicatorPoint[], lag: number): IndicatorPoint[] {
  return points.map((p, i) => {
    const prev = i >= lag ? points[i - lag].value : null;
    return { date: p.date, value: p.value === null || prev === null ? null : p.value - prev };
  });
}
