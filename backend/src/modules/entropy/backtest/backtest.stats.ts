/**
 * Backtest Statistics Calculator
 * Aggregates a trade ledger into win rate, significance and return distribution
 */

import type {
  BacktestResult,
  Significance,
  StrategyName,
  TradeLedger,
} from '../entropy.types.js';
import {
  binomialUpperTail,
  mean,
  percentile,
  stdDev,
  studentTUpperTail,
} from '../utils/statistics.js';

const Z_95 = 1.96;

export const DEFAULT_CRASH_THRESHOLD = -0.05;

export function significanceStars(p: number | null): Significance {
  if (p === null) return '';
  if (p < 0.001) return '***';
  if (p < 0.01) return '**';
  if (p < 0.05) return '*';
  return '';
}

export class BacktestStatsCalculator {
  /** @param crashThreshold log return below which a trade counts as a crash */
  constructor(private readonly crashThreshold = DEFAULT_CRASH_THRESHOLD) {}

  /**
   * Win rate is never reported without its sample size and p-value;
   * all three are null together only for an empty ledger.
   */
  summarize(ledger: TradeLedger, market: string, strategy: StrategyName): BacktestResult {
    const returns = ledger.trades.map(t => t.realizedReturn);
    const n = returns.length;
    const base = {
      market,
      strategy,
      mode: ledger.mode,
      holdingPeriod: ledger.holdingPeriod,
      sampleSize: n,
      skipped: { ...ledger.skipped },
    };

    if (n === 0) {
      return {
        ...base,
        wins: 0,
        winRate: null,
        pValue: null,
        significance: '',
        meanReturn: null,
        medianReturn: null,
        stdReturn: null,
        minReturn: null,
        maxReturn: null,
        distribution: null,
        tStat: null,
        pValueReturn: null,
        ciLow: null,
        ciHigh: null,
        crashRate: null,
      };
    }

    const wins = returns.filter(r => r > 0).length;
    const pValue = binomialUpperTail(wins, n, 0.5);
    const avg = mean(returns);
    const std = stdDev(returns);
    const test = this.tTest(avg, std, n);
    const crashes = ledger.trades.filter(t => t.logReturn < this.crashThreshold).length;

    return {
      ...base,
      wins,
      winRate: wins / n,
      pValue,
      significance: significanceStars(pValue),
      meanReturn: avg,
      medianReturn: percentile(returns, 50),
      stdReturn: std,
      minReturn: Math.min(...returns),
      maxReturn: Math.max(...returns),
      distribution: {
        p10: percentile(returns, 10),
        p50: percentile(returns, 50),
        p90: percentile(returns, 90),
      },
      ...test,
      crashRate: crashes / n,
    };
  }

  /**
   * One-sided one-sample t-test, H1: mean > 0, plus a 95% normal CI.
   */
  private tTest(avg: number, std: number, n: number) {
    const se = std / Math.sqrt(n);
    if (n < 2 || se === 0) {
      return { tStat: null, pValueReturn: null, ciLow: null, ciHigh: null };
    }
    const tStat = avg / se;
    return {
      tStat,
      pValueReturn: studentTUpperTail(tStat, n - 1),
      ciLow: avg - Z_95 * se,
      ciHigh: avg + Z_95 * se,
    };
  }
}
