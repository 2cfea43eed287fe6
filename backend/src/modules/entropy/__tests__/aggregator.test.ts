/**
 * CROSS-MARKET AGGREGATOR TESTS
 *
 * End to end over the synthetic source: per-market failures, stable
 * ordering, artifact reuse.
 */

import { describe, it, expect } from 'vitest';
import type { BacktestResult, CrossMarketReport, MarketReport } from '../entropy.types.js';
import { MarketConfigBuilder, StudyConfigBuilder, type MarketConfig, type StudyConfig } from '../entropy.config.js';
import { InMemoryPriceCache } from '../data/price.cache.js';
import { InMemoryEntropyStore } from '../data/entropy.store.js';
import { SyntheticPriceProvider } from '../data/providers/synthetic.provider.js';
import { CrossMarketAggregator, buildComparison } from '../pipeline/cross-market.aggregator.js';
import type { MarketPipelineDeps } from '../pipeline/market.pipeline.js';

function market(key: string, tickers: string[]): MarketConfig {
  return new MarketConfigBuilder(key).benchmark(`^${key}`).tickers(tickers).build();
}

const ALPHA = market('ALPHA', ['A1', 'A2', 'A3', 'A4', 'A5']);
const BETA = market('BETA', ['B1', 'B2', 'B3', 'B4', 'B5']);
// three of four constituents missing at the source
const GAMMA = market('GAMMA', ['C1', 'C2', 'C3', 'C4']);
// benchmark missing at the source
const DELTA = market('DELTA', ['D1', 'D2', 'D3', 'D4']);

function deps(): MarketPipelineDeps {
  return {
    cache: new InMemoryPriceCache(),
    provider: new SyntheticPriceProvider({ seed: 11, missing: ['C2', 'C3', 'C4', '^DELTA'] }),
    entropyStore: new InMemoryEntropyStore(),
  };
}

function study(markets: MarketConfig[]): StudyConfig {
  const builder = new StudyConfigBuilder()
    .window(20)
    .holdingPeriod(5)
    .trainingRange({ from: '2022-01-01', to: '2022-06-30' })
    .testingRange({ from: '2022-07-01', to: '2022-12-31' })
    .tradeModes(['weekly', 'overlapping'])
    .overrides({ minInstruments: 3, sensitivityPercentiles: [80, 90] })
    .volatility({ ticker: '^VIX', name: 'Volatility', namespace: 'vix' });
  for (const m of markets) builder.addMarket(m);
  return builder.build();
}

function content(report: CrossMarketReport) {
  return { markets: report.markets, comparison: report.comparison, failures: report.failures };
}

describe('CrossMarketAggregator', () => {
  it('should report failed markets and keep the others', async () => {
    const report = await new CrossMarketAggregator(deps()).run(study([ALPHA, GAMMA, DELTA, BETA]), {
      runId: 'run-1',
    });

    expect(report.runId).toBe('run-1');
    expect(report.source).toBe('synthetic');
    expect(report.markets.map(m => m.market)).toEqual(['ALPHA', 'BETA']);
    expect(report.failures.map(f => [f.market, f.error])).toEqual([
      ['DELTA', 'DATA_UNAVAILABLE'],
      ['GAMMA', 'INSUFFICIENT_HISTORY'],
    ]);
    expect(report.failures[1].message).toBe('Only 1 instruments with complete history (need 3)');
  });

  it('should run every strategy in every trade mode', async () => {
    const report = await new CrossMarketAggregator(deps()).run(study([ALPHA]));
    const alpha = report.markets[0];

    expect(alpha.tickers).toEqual(['A1', 'A2', 'A3', 'A4', 'A5']);
    expect(alpha.results.map(r => [r.strategy, r.mode])).toEqual([
      ['entropy', 'weekly'],
      ['volatility', 'weekly'],
      ['combined', 'weekly'],
      ['entropy', 'overlapping'],
      ['volatility', 'overlapping'],
      ['combined', 'overlapping'],
    ]);
    expect(alpha.thresholds.entropy.trainedOn).toEqual({ from: '2022-01-01', to: '2022-06-30' });
    expect(alpha.thresholds.volatility).not.toBeNull();
    expect(alpha.sensitivity.map(s => s.percentile)).toEqual([80, 90]);
    expect(alpha.entropy.fromCache).toBe(false);

    for (const r of alpha.results) {
      expect(r.winRate === null).toBe(r.sampleSize === 0);
    }

    // combined entries are a subset of the entropy entries
    const entropyOverlapping = alpha.results[3];
    const combinedOverlapping = alpha.results[5];
    expect(combinedOverlapping.sampleSize).toBeLessThanOrEqual(entropyOverlapping.sampleSize);
  });

  it('should not depend on the order markets are listed in', async () => {
    const forward = await new CrossMarketAggregator(deps()).run(study([ALPHA, BETA, GAMMA]));
    const reversed = await new CrossMarketAggregator(deps()).run(study([GAMMA, BETA, ALPHA]));

    expect(content(reversed)).toEqual(content(forward));
    expect(forward.runId).not.toBe(reversed.runId);
  });

  it('should reuse the stored entropy series on a rerun with the same inputs', async () => {
    const shared = deps();
    const first = await new CrossMarketAggregator(shared).run(study([ALPHA]));
    const second = await new CrossMarketAggregator(shared).run(study([ALPHA]));

    const strip = (m: MarketReport) => ({ ...m, entropy: { ...m.entropy, fromCache: false } });
    expect(first.markets[0].entropy.fromCache).toBe(false);
    expect(second.markets[0].entropy.fromCache).toBe(true);
    expect(strip(second.markets[0])).toEqual(strip(first.markets[0]));
  });

  it('should skip the volatility baseline when it is disabled', async () => {
    const config = { ...study([ALPHA]), volatility: null };
    const report = await new CrossMarketAggregator(deps()).run(config);
    const alpha = report.markets[0];

    expect(alpha.results.map(r => r.strategy)).toEqual(['entropy', 'entropy']);
    expect(alpha.thresholds.volatility).toBeNull();
    expect(alpha.entropyVolatilityCorrelation).toBeNull();
    expect(alpha.sensitivity[0].volatility).toBeNull();
  });
});

describe('buildComparison', () => {
  function result(market: string, strategy: BacktestResult['strategy'], mode: BacktestResult['mode']): BacktestResult {
    return {
      market,
      strategy,
      mode,
      holdingPeriod: 30,
      sampleSize: 0,
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
      skipped: { unmatched: 0, beyondData: 0, overlapping: 0, offWeekday: 0 },
    };
  }

  function report(key: string, results: BacktestResult[]): MarketReport {
    return {
      market: key,
      name: key,
      benchmark: `^${key}`,
      tickers: [],
      excluded: [],
      window: 60,
      entropy: { points: 0, validPoints: 0, invalidPoints: 0, min: null, max: null, mean: null, fromCache: false },
      thresholds: {
        entropy: { value: 0, percentile: 90, trainedOn: { from: '2020-01-01', to: '2020-12-31' }, sampleSize: 0 },
        volatility: null,
      },
      signals: { evaluationDays: 0, entropyEntries: 0 },
      results,
      buckets: [],
      sensitivity: [],
      entropyVolatilityCorrelation: null,
      forwardCorrelations: [],
      entropyChange: {
        lag: 5,
        threshold: { value: 0, percentile: 95, trainedOn: { from: '2020-01-01', to: '2020-12-31' }, sampleSize: 0 },
        entries: 0,
        results: [],
      },
    };
  }

  it('should order rows by market, strategy and trade mode', () => {
    const rows = buildComparison([
      report('US', [result('US', 'combined', 'weekly'), result('US', 'entropy', 'weekly'), result('US', 'entropy', 'overlapping')]),
      report('ASIA', [result('ASIA', 'volatility', 'non_overlapping'), result('ASIA', 'entropy', 'non_overlapping')]),
    ]);

    expect(rows.map(r => `${r.market}/${r.strategy}/${r.mode}`)).toEqual([
      'ASIA/entropy/non_overlapping',
      'ASIA/volatility/non_overlapping',
      'US/entropy/overlapping',
      'US/entropy/weekly',
      'US/combined/weekly',
    ]);
    expect(rows[0]).toEqual({
      market: 'ASIA',
      strategy: 'entropy',
      mode: 'non_overlapping',
      win_rate: null,
      sample_size: 0,
      p_value: null,
    });
  });
});
