/**
 * ENTROPY MODULE — Backtester
 *
 * enter signal at t → long the benchmark from close(t) to close(t + H),
 * H counted in benchmark trading days.
 *
 * Modes:
 *   overlapping      every signal is its own trade (default)
 *   non_overlapping  a signal on or before the open trade's exit is skipped
 *   weekly           signals only on the check weekday, non-overlapping
 *
 * A trade whose exit falls past the last available close is discarded,
 * never truncated.
 */

import type {
  DateRange,
  PriceSeries,
  Signal,
  Trade,
  TradeLedger,
  TradeMode,
} from '../entropy.types.js';
import { inRange, weekday } from '../utils/dates.js';

export interface BacktestOptions {
  holdingPeriod: number;
  mode?: TradeMode;
  /** 0 = Sunday … 6 = Saturday; weekly mode only */
  weeklyCheckDay?: number;
  /** backtest window; benchmark closes outside it are ignored */
  range?: DateRange;
}

interface Close {
  date: string;
  price: number;
}

/** Benchmark closes in the window, ascending, one per date. */
export function benchmarkCloses(benchmark: PriceSeries, range?: DateRange): Close[] {
  const byDate = new Map<string, number>();
  for (const p of benchmark.points) {
    if (range && !inRange(p.date, range)) continue;
    byDate.set(p.date, p.adjustedClose);
  }
  return [...byDate.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([date, price]) => ({ date, price }));
}

export function runBacktest(
  signals: readonly Signal[],
  benchmark: PriceSeries,
  options: BacktestOptions
): TradeLedger {
  const mode = options.mode ?? 'overlapping';
  const checkDay = options.weeklyCheckDay ?? 1;
  const closes = benchmarkCloses(benchmark, options.range);
  const index = new Map(closes.map((c, i): [string, number] => [c.date, i]));

  const ledger: TradeLedger = {
    mode,
    holdingPeriod: options.holdingPeriod,
    trades: [],
    skipped: { unmatched: 0, beyondData: 0, overlapping: 0, offWeekday: 0 },
  };

  const entries = signals
    .filter(s => s.direction === 'enter')
    .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

  let lastExit = -1;
  for (const signal of entries) {
    if (mode === 'weekly' && weekday(signal.date) !== checkDay) {
      ledger.skipped.offWeekday++;
      continue;
    }

    const i = index.get(signal.date);
    if (i === undefined) {
      ledger.skipped.unmatched++;
      continue;
    }

    if (mode !== 'overlapping' && i <= lastExit) {
      ledger.skipped.overlapping++;
      continue;
    }

    const exit = i + options.holdingPeriod;
    if (exit >= closes.length) {
      ledger.skipped.beyondData++;
      continue;
    }

    ledger.trades.push(makeTrade(closes[i], closes[exit], signal.value));
    lastExit = exit;
  }

  return ledger;
}

function makeTrade(entry: Close, exit: Close, signalValue: number | null): Trade {
  return {
    entryDate: entry.date,
    exitDate: exit.date,
    entryPrice: entry.price,
    exitPrice: exit.price,
    realizedReturn: exit.price / entry.price - 1,
    logReturn: Math.log(exit.price / entry.price),
    signalValue,
  };
}

/**
 * Forward return over H trading days for every close that has one.
 */
export function forwardReturns(
  benchmark: PriceSeries,
  holdingPeriod: number,
  range?: DateRange
): Map<string, number> {
  const closes = benchmarkCloses(benchmark, range);
  const out = new Map<string, number>();
  for (let i = 0; i + holdingPeriod < closes.length; i++) {
    out.set(closes[i].date, closes[i + holdingPeriod].price / closes[i].price - 1);
  }
  return out;
}
