/**
 * ENTROPY MODULE — Cross-Market Aggregator
 *
 * Runs the market pipeline for every configured market concurrently and
 * joins the results into one comparison table. Output is ordered by market
 * key, never by input order.
 *
 * Per-market failures (insufficient history, a required instrument without
 * data) are reported and the other markets continue. A source that keeps
 * failing aborts the whole study.
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  ComparisonRow,
  CrossMarketReport,
  MarketFailure,
  MarketReport,
  PriceSeries,
  StrategyName,
  TradeMode,
} from '../entropy.types.js';
import { studyPeriod, TRADE_MODES, type MarketConfig, type StudyConfig } from '../entropy.config.js';
import { DataUnavailableError, InsufficientHistoryError } from '../entropy.errors.js';
import { loadRequired } from '../data/price.loader.js';
import { silentLogger } from '../utils/logger.js';
import { MarketPipeline, type MarketPipelineDeps } from './market.pipeline.js';

const STRATEGY_ORDER: readonly StrategyName[] = ['entropy', 'volatility', 'combined', 'entropy_change'];

type MarketOutcome =
  | { ok: true; report: MarketReport }
  | { ok: false; failure: MarketFailure };

function byKey(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export interface AggregatorRunOptions {
  runId?: string;
  source?: string;
}

export class CrossMarketAggregator {
  private readonly pipeline: MarketPipeline;

  constructor(private readonly deps: MarketPipelineDeps) {
    this.pipeline = new MarketPipeline(deps);
  }

  private get logger() {
    return this.deps.logger ?? silentLogger;
  }

  async run(study: StudyConfig, options: AggregatorRunOptions = {}): Promise<CrossMarketReport> {
    const started = Date.now();
    const runId = options.runId ?? uuidv4();
    this.logger.info(`[Entropy] run ${runId}: ${study.markets.map(m => m.key).join(', ')}`);

    const volatility = await this.loadVolatility(study);

    const outcomes = await Promise.all(
      study.markets.map(market => this.runMarket(market, study, volatility))
    );

    const markets: MarketReport[] = [];
    const failures: MarketFailure[] = [];
    for (const o of outcomes) {
      if (o.ok) markets.push(o.report);
      else failures.push(o.failure);
    }
    markets.sort((a, b) => byKey(a.market, b.market));
    failures.sort((a, b) => byKey(a.market, b.market));

    const durationMs = Date.now() - started;
    this.logger.info(
      `[Entropy] run ${runId}: ${markets.length} markets ok, ${failures.length} failed (${durationMs}ms)`
    );

    return {
      runId,
      generatedAt: new Date().toISOString(),
      source: options.source ?? this.deps.provider.name,
      markets,
      comparison: buildComparison(markets),
      failures,
      durationMs,
    };
  }

  private async loadVolatility(study: StudyConfig): Promise<PriceSeries | null> {
    if (!study.volatility) return null;
    const { namespace, ticker } = study.volatility;
    return loadRequired(this.deps, namespace, ticker, studyPeriod(study));
  }

  private async runMarket(
    market: MarketConfig,
    study: StudyConfig,
    volatility: PriceSeries | null
  ): Promise<MarketOutcome> {
    try {
      return { ok: true, report: await this.pipeline.run(market, study, volatility) };
    } catch (err) {
      if (err instanceof InsufficientHistoryError || err instanceof DataUnavailableError) {
        this.logger.error(`[Entropy] ${market.key}: ${err.code} ${err.message}`);
        return { ok: false, failure: { market: market.key, error: err.code, message: err.message } };
      }
      throw err;
    }
  }
}

/**
 * One row per (market, strategy, mode), ordered by market key, then
 * strategy, then trade mode.
 */
export function buildComparison(markets: readonly MarketReport[]): ComparisonRow[] {
  const rank = <T>(order: readonly T[], x: T) => order.indexOf(x);
  const rows: ComparisonRow[] = markets.flatMap(m =>
    m.results.map(r => ({
      market: m.market,
      strategy: r.strategy,
      mode: r.mode,
      win_rate: r.winRate,
      sample_size: r.sampleSize,
      p_value: r.pValue,
    }))
  );
  return rows.sort(
    (a, b) =>
      byKey(a.market, b.market) ||
      rank<StrategyName>(STRATEGY_ORDER, a.strategy) - rank<StrategyName>(STRATEGY_ORDER, b.strategy) ||
      rank<TradeMode>(TRADE_MODES, a.mode) - rank<TradeMode>(TRADE_MODES, b.mode)
  );
}
