/**
 * ENTROPY MODULE — Market Pipeline
 *
 * One parameterized pipeline per market:
 *
 *   universe prices → return matrix → rolling entropy (artifact store)
 *     → train/evaluation split → threshold → signals → benchmark backtest
 *
 * The volatility index runs through the same split/threshold/signal/backtest
 * path as a baseline, and "combined" enters only when both fire.
 * Nothing here is shared between markets except the injected cache and
 * store, whose writes are serialized.
 */

import type {
  BacktestResult,
  EntropyChangeReport,
  EntropySeries,
  ForwardCorrelation,
  IndicatorPoint,
  MarketReport,
  PriceSeries,
  ReturnMatrix,
  SensitivityCell,
  SensitivityRow,
  Signal,
  StrategyName,
  TradeMode,
  TrainedThreshold,
} from '../entropy.types.js';
import { studyPeriod, type MarketConfig, type StudyConfig } from '../entropy.config.js';
import type { EntropyStore } from '../data/entropy.store.js';
import { loadRequired, loadUniverse, type PriceLoaderDeps } from '../data/price.loader.js';
import { computeReturnMatrix } from '../engine/returns.calculator.js';
import { computeRollingEntropy, summarizeEntropy } from '../engine/entropy.engine.js';
import {
  entropyChangeIndicator,
  entropyIndicator,
  priceIndicator,
  splitTrainTest,
} from '../signal/train-test.split.js';
import { fitThreshold } from '../signal/threshold.js';
import { combineSignals, countEntries, generateSignals } from '../signal/signal.generator.js';
import { forwardReturns, runBacktest } from '../backtest/backtester.js';
import { BacktestStatsCalculator } from '../backtest/backtest.stats.js';
import { bucketForwardReturns, forwardCorrelation } from '../backtest/segment.analysis.js';
import { correlation } from '../utils/statistics.js';
import { silentLogger } from '../utils/logger.js';

export interface MarketPipelineDeps extends PriceLoaderDeps {
  entropyStore: EntropyStore;
}

export class MarketPipeline {
  constructor(private readonly deps: MarketPipelineDeps) {}

  private get logger() {
    return this.deps.logger ?? silentLogger;
  }

  /**
   * @param volatility volatility index levels over the study period, or null
   *   to skip the baseline
   */
  async run(market: MarketConfig, study: StudyConfig, volatility: PriceSeries | null): Promise<MarketReport> {
    const period = studyPeriod(study);
    const tickers = market.tickers.slice(0, study.universeSize);
    this.logger.info(`[Entropy] ${market.key}: ${tickers.length} instruments, ${period.from}..${period.to}`);

    const universe = await loadUniverse(this.deps, market.namespace, tickers, period);
    const matrix = computeReturnMatrix(universe.series, {
      window: study.window,
      minCoverage: study.minCoverage,
      minInstruments: study.minInstruments,
      range: period,
      coverageRange: study.trainingRange,
    });

    const { series, fromCache } = await this.entropySeries(market, study, matrix);
    const benchmark = await loadRequired(this.deps, market.namespace, market.benchmark, period);

    const ranges = { training: study.trainingRange, testing: study.testingRange };
    const entropyPoints = entropyIndicator(series);
    const entropySplit = splitTrainTest(entropyPoints, ranges);
    const entropyThreshold = fitThreshold(entropySplit.training, study.thresholdPercentile);
    const entropySignals = generateSignals(entropySplit.evaluation, entropyThreshold);

    let volatilityThreshold: TrainedThreshold | null = null;
    const strategies = new Map<StrategyName, Signal[]>([['entropy', entropySignals]]);
    let volatilityPoints: IndicatorPoint[] = [];
    if (volatility) {
      volatilityPoints = priceIndicator(volatility);
      const volSplit = splitTrainTest(volatilityPoints, ranges);
      volatilityThreshold = fitThreshold(volSplit.training, study.thresholdPercentile);
      const volSignals = generateSignals(volSplit.evaluation, volatilityThreshold);
      strategies.set('volatility', volSignals);
      strategies.set('combined', combineSignals(entropySignals, volSignals));
    }

    const results: BacktestResult[] = [];
    for (const mode of study.tradeModes) {
      for (const [strategy, signals] of strategies) {
        results.push(this.backtest(market.key, strategy, signals, benchmark, study, mode));
      }
    }

    const entropyStats = summarizeEntropy(series);
    this.logger.info(
      `[Entropy] ${market.key}: threshold ${entropyThreshold.value.toFixed(4)} ` +
      `(p${study.thresholdPercentile}), ${countEntries(entropySignals)} entries in ${entropySignals.length} days`
    );

    return {
      market: market.key,
      name: market.name,
      benchmark: market.benchmark,
      tickers: [...matrix.tickers],
      excluded: [...universe.excluded, ...matrix.excluded],
      window: study.window,
      entropy: { ...entropyStats, fromCache },
      thresholds: { entropy: entropyThreshold, volatility: volatilityThreshold },
      signals: {
        evaluationDays: entropySignals.length,
        entropyEntries: countEntries(entropySignals),
      },
      results,
      buckets: bucketForwardReturns(entropyPoints, forwardReturns(benchmark, study.holdingPeriod, period)),
      sensitivity: this.sensitivity(market.key, entropyPoints, volatility ? volatilityPoints : null, benchmark, study),
      entropyVolatilityCorrelation: volatility ? indicatorCorrelation(entropyPoints, volatilityPoints) : null,
      forwardCorrelations: this.forwardCorrelations(entropyPoints, benchmark, study),
      entropyChange: this.entropyChange(market.key, entropyPoints, benchmark, study),
    };
  }

  /**
   * Threshold on S(t) - S(t - lag), fitted on training and backtested in
   * every trade mode. Reported beside the main strategies.
   */
  private entropyChange(
    market: string,
    entropyPoints: IndicatorPoint[],
    benchmark: PriceSeries,
    study: StudyConfig
  ): EntropyChangeReport {
    const ranges = { training: study.trainingRange, testing: study.testingRange };
    const split = splitTrainTest(entropyChangeIndicator(entropyPoints, study.changeLag), ranges);
    const threshold = fitThreshold(split.training, study.changePercentile);
    const signals = generateSignals(split.evaluation, threshold);
    return {
      lag: study.changeLag,
      threshold,
      entries: countEntries(signals),
      results: study.tradeModes.map(mode =>
        this.backtest(market, 'entropy_change', signals, benchmark, study, mode)
      ),
    };
  }

  /** Entropy level and change against forward benchmark returns, evaluation period only. */
  private forwardCorrelations(
    entropyPoints: IndicatorPoint[],
    benchmark: PriceSeries,
    study: StudyConfig
  ): ForwardCorrelation[] {
    const ranges = { training: study.trainingRange, testing: study.testingRange };
    const level = splitTrainTest(entropyPoints, ranges).evaluation.points;
    const change = splitTrainTest(entropyChangeIndicator(entropyPoints, study.changeLag), ranges).evaluation.points;

    const rows: ForwardCorrelation[] = [];
    for (const horizon of study.correlationHorizons) {
      const forward = forwardReturns(benchmark, horizon, study.testingRange);
      rows.push({ indicator: 'entropy', horizon, ...forwardCorrelation(level, forward) });
      rows.push({ indicator: 'entropy_change', horizon, ...forwardCorrelation(change, forward) });
    }
    return rows;
  }

  private async entropySeries(
    market: MarketConfig,
    study: StudyConfig,
    matrix: ReturnMatrix
  ): Promise<{ series: EntropySeries; fromCache: boolean }> {
    const key = {
      market: market.namespace,
      window: study.window,
      ridge: study.ridge,
      pivotTolerance: study.pivotTolerance,
      range: studyPeriod(study),
      tickers: matrix.tickers,
    };

    const cached = await this.deps.entropyStore.load(key);
    if (cached) {
      this.logger.info(`[Entropy] ${market.key}: entropy series from cache (${cached.points.length} points)`);
      return { series: cached, fromCache: true };
    }

    const series = computeRollingEntropy(
      matrix,
      { window: study.window, ridge: study.ridge, pivotTolerance: study.pivotTolerance },
      market.key
    );
    const invalid = series.points.filter(p => !p.valid).length;
    if (invalid > 0) {
      this.logger.warn(`[Entropy] ${market.key}: ${invalid} dates with invalid entropy (gaps kept)`);
    }
    await this.deps.entropyStore.save(key, series);
    return { series, fromCache: false };
  }

  private backtest(
    market: string,
    strategy: StrategyName,
    signals: readonly Signal[],
    benchmark: PriceSeries,
    study: StudyConfig,
    mode: TradeMode
  ): BacktestResult {
    const ledger = runBacktest(signals, benchmark, {
      holdingPeriod: study.holdingPeriod,
      mode,
      weeklyCheckDay: study.weeklyCheckDay,
      range: study.testingRange,
    });
    return new BacktestStatsCalculator(study.crashThreshold).summarize(ledger, market, strategy);
  }

  /**
   * Same backtest at several threshold percentiles, first trade mode only.
   */
  private sensitivity(
    market: string,
    entropyPoints: IndicatorPoint[],
    volatilityPoints: IndicatorPoint[] | null,
    benchmark: PriceSeries,
    study: StudyConfig
  ): SensitivityRow[] {
    const ranges = { training: study.trainingRange, testing: study.testingRange };
    const mode = study.tradeModes[0];
    const entropySplit = splitTrainTest(entropyPoints, ranges);
    const volSplit = volatilityPoints ? splitTrainTest(volatilityPoints, ranges) : null;

    const cell = (strategy: StrategyName, signals: Signal[]): SensitivityCell => {
      const r = this.backtest(market, strategy, signals, benchmark, study, mode);
      return { sampleSize: r.sampleSize, winRate: r.winRate, pValue: r.pValue, meanReturn: r.meanReturn };
    };

    return study.sensitivityPercentiles.map(pct => {
      const eThreshold = fitThreshold(entropySplit.training, pct);
      const row: SensitivityRow = {
        percentile: pct,
        entropyThreshold: eThreshold.value,
        volatilityThreshold: null,
        entropy: cell('entropy', generateSignals(entropySplit.evaluation, eThreshold)),
        volatility: null,
      };
      if (volSplit) {
        const vThreshold = fitThreshold(volSplit.training, pct);
        row.volatilityThreshold = vThreshold.value;
        row.volatility = cell('volatility', generateSignals(volSplit.evaluation, vThreshold));
      }
      return row;
    });
  }
}

/** Pearson correlation over dates where both indicators have a value. */
export function indicatorCorrelation(a: readonly IndicatorPoint[], b: readonly IndicatorPoint[]): number | null {
  const other = new Map<string, number>();
  for (const p of b) if (p.value !== null) other.set(p.date, p.value);

  const xs: number[] = [];
  const ys: number[] = [];
  for (const p of a) {
    const y = other.get(p.date);
    if (p.value === null || y === undefined) continue;
    xs.push(p.value);
    ys.push(y);
  }
  return correlation(xs, ys);
}
