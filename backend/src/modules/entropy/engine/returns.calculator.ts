/**
 * ENTROPY ENGINE — Return Calculator
 *
 * Price series → date-aligned log-return matrix.
 * Instruments covering less than `minCoverage` of the union calendar inside
 * `coverageRange` are dropped entirely; the rest are inner-joined on common
 * dates over the full `range`. No fill.
 *
 * The pipeline passes the training range as `coverageRange`, so which
 * instruments make up the matrix never depends on evaluation-period data.
 * Gaps after the training range only remove dates through the join.
 */

import type {
  DateRange,
  ExcludedInstrument,
  PriceSeries,
  ReturnMatrix,
} from '../entropy.types.js';
import { InsufficientHistoryError } from '../entropy.errors.js';
import { inRange } from '../utils/dates.js';

export interface ReturnOptions {
  window: number;
  /** fraction of the union calendar an instrument must cover (0 = no filter) */
  minCoverage?: number;
  minInstruments?: number;
  range?: DateRange;
  /** dates the coverage test counts (default: `range`) */
  coverageRange?: DateRange;
}

export function logReturn(prev: number, next: number): number {
  return Math.log(next / prev);
}

export function computeReturnMatrix(
  series: ReadonlyMap<string, PriceSeries>,
  options: ReturnOptions
): ReturnMatrix {
  const minCoverage = options.minCoverage ?? 0;
  const minInstruments = options.minInstruments ?? 2;

  // ticker → date → price, restricted to the study range
  const prices = new Map<string, Map<string, number>>();
  const calendar = new Set<string>();
  const coverageCalendar = new Set<string>();
  const covered = new Map<string, number>();
  for (const [ticker, s] of series) {
    const byDate = new Map<string, number>();
    let count = 0;
    for (const p of s.points) {
      if (options.range && !inRange(p.date, options.range)) continue;
      const seen = byDate.has(p.date);
      byDate.set(p.date, p.adjustedClose);
      calendar.add(p.date);
      if (!options.coverageRange || inRange(p.date, options.coverageRange)) {
        coverageCalendar.add(p.date);
        if (!seen) count++;
      }
    }
    prices.set(ticker, byDate);
    covered.set(ticker, count);
  }

  const excluded: ExcludedInstrument[] = [];
  const kept: string[] = [];
  const required = minCoverage * coverageCalendar.size;
  for (const [ticker, byDate] of prices) {
    const count = covered.get(ticker) ?? 0;
    if (byDate.size === 0 || count === 0 || count < required) {
      excluded.push({
        ticker,
        reason: 'INCOMPLETE_HISTORY',
        detail: `${count}/${coverageCalendar.size} dates`,
      });
    } else {
      kept.push(ticker);
    }
  }

  if (kept.length < minInstruments) {
    throw new InsufficientHistoryError(
      `Only ${kept.length} instruments with complete history (need ${minInstruments})`,
      { instruments: kept.length, minInstruments, excluded: excluded.length }
    );
  }

  const common = [...calendar]
    .filter(date => kept.every(t => prices.get(t)?.has(date)))
    .sort();

  if (common.length < options.window + 1) {
    throw new InsufficientHistoryError(
      `Only ${common.length} common trading dates (need ${options.window + 1} for window ${options.window})`,
      { commonDates: common.length, window: options.window }
    );
  }

  const columns = kept.map(t => {
    const byDate = prices.get(t) ?? new Map<string, number>();
    return common.map(d => byDate.get(d) ?? NaN);
  });

  const rows: number[][] = [];
  for (let i = 1; i < common.length; i++) {
    rows.push(columns.map(col => logReturn(col[i - 1], col[i])));
  }

  return {
    dates: common.slice(1),
    tickers: kept,
    rows,
    excluded,
  };
}
