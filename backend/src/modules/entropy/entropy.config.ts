/**
 * ENTROPY MODULE — Study Configuration
 *
 * One parameterized pipeline serves every market. A study is assembled with
 * StudyConfigBuilder from defaults, the market catalog and per-run overrides,
 * and validated once before any data is fetched.
 */

import { ConfigValidationError, LookaheadViolationError } from './entropy.errors.js';
import type { DateRange, TradeMode } from './entropy.types.js';
import { isValidDate } from './utils/dates.js';

// ═══════════════════════════════════════════════════════════════
// DEFAULTS
// ═══════════════════════════════════════════════════════════════

const DEFAULT_TRADE_MODES: TradeMode[] = ['overlapping'];
const DEFAULT_TRAINING_RANGE: DateRange = { from: '2005-01-01', to: '2019-12-31' };

export const ENTROPY_DEFAULTS = {
  window: 60,
  thresholdPercentile: 90,
  holdingPeriod: 30,
  universeSize: 50,
  tradeModes: DEFAULT_TRADE_MODES,
  weeklyCheckDay: 1, // Monday
  minCoverage: 0.95,
  minInstruments: 10,
  ridge: 0,
  pivotTolerance: 1e-10,
  sensitivityPercentiles: [80, 85, 90, 95],
  crashThreshold: -0.05,
  changeLag: 5,
  changePercentile: 95,
  correlationHorizons: [5, 10, 30],
  trainingRange: DEFAULT_TRAINING_RANGE,
  testingFrom: '2020-01-01',
};

export const TRADE_MODES: readonly TradeMode[] = ['overlapping', 'non_overlapping', 'weekly'];

// ═══════════════════════════════════════════════════════════════
// CONFIG SHAPES
// ═══════════════════════════════════════════════════════════════

export interface MarketConfig {
  key: string;
  name: string;
  benchmark: string;
  /** cache directory for this market's artifacts */
  namespace: string;
  tickers: string[];
}

export interface VolatilityConfig {
  ticker: string;
  name: string;
  namespace: string;
}

export interface StudyConfig {
  window: number;
  thresholdPercentile: number;
  holdingPeriod: number;
  trainingRange: DateRange;
  testingRange: DateRange;
  universeSize: number;
  tradeModes: TradeMode[];
  weeklyCheckDay: number;
  minCoverage: number;
  minInstruments: number;
  ridge: number;
  pivotTolerance: number;
  sensitivityPercentiles: number[];
  /** log return below which a trade counts as a crash */
  crashThreshold: number;
  /** entropy-change signal: S(t) - S(t - changeLag) */
  changeLag: number;
  changePercentile: number;
  correlationHorizons: number[];
  markets: MarketConfig[];
  volatility: VolatilityConfig | null;
}

/** Per-run overrides accepted from the API and the CLI. */
export type StudyOverrides = Partial<
  Omit<StudyConfig, 'markets' | 'volatility'>
>;

/** Full period the price data must cover. */
export function studyPeriod(config: Pick<StudyConfig, 'trainingRange' | 'testingRange'>): DateRange {
  return { from: config.trainingRange.from, to: config.testingRange.to };
}

// ═══════════════════════════════════════════════════════════════
// MARKET BUILDER
// ═══════════════════════════════════════════════════════════════

export class MarketConfigBuilder {
  private readonly config: MarketConfig;

  constructor(key: string) {
    this.config = { key, name: key, benchmark: '', namespace: key.toLowerCase(), tickers: [] };
  }

  name(name: string): this {
    this.config.name = name;
    return this;
  }

  benchmark(ticker: string): this {
    this.config.benchmark = ticker;
    return this;
  }

  namespace(namespace: string): this {
    this.config.namespace = namespace;
    return this;
  }

  tickers(tickers: string[]): this {
    this.config.tickers = [...tickers];
    return this;
  }

  build(): MarketConfig {
    const problems: string[] = [];
    if (!this.config.key) problems.push('market key is required');
    if (!this.config.benchmark) problems.push(`market ${this.config.key}: benchmark is required`);
    if (this.config.tickers.length === 0) problems.push(`market ${this.config.key}: tickers are required`);
    if (new Set(this.config.tickers).size !== this.config.tickers.length) {
      problems.push(`market ${this.config.key}: duplicate tickers`);
    }
    if (!/^[a-z0-9_-]+$/i.test(this.config.namespace)) {
      problems.push(`market ${this.config.key}: namespace must be a plain directory name`);
    }
    if (problems.length > 0) throw new ConfigValidationError(problems);
    return { ...this.config, tickers: [...this.config.tickers] };
  }
}

// ═══════════════════════════════════════════════════════════════
// STUDY BUILDER
// ═══════════════════════════════════════════════════════════════

function todayUtc(): string {
  return new Date().toISOString().slice(0, 10);
}

export class StudyConfigBuilder {
  private params: Omit<StudyConfig, 'markets' | 'volatility' | 'testingRange'> & {
    testingRange: DateRange | null;
  };
  private readonly marketList: MarketConfig[] = [];
  private volatilityConfig: VolatilityConfig | null = null;

  constructor() {
    this.params = {
      window: ENTROPY_DEFAULTS.window,
      thresholdPercentile: ENTROPY_DEFAULTS.thresholdPercentile,
      holdingPeriod: ENTROPY_DEFAULTS.holdingPeriod,
      trainingRange: { ...ENTROPY_DEFAULTS.trainingRange },
      testingRange: null,
      universeSize: ENTROPY_DEFAULTS.universeSize,
      tradeModes: [...ENTROPY_DEFAULTS.tradeModes],
      weeklyCheckDay: ENTROPY_DEFAULTS.weeklyCheckDay,
      minCoverage: ENTROPY_DEFAULTS.minCoverage,
      minInstruments: ENTROPY_DEFAULTS.minInstruments,
      ridge: ENTROPY_DEFAULTS.ridge,
      pivotTolerance: ENTROPY_DEFAULTS.pivotTolerance,
      sensitivityPercentiles: [...ENTROPY_DEFAULTS.sensitivityPercentiles],
      crashThreshold: ENTROPY_DEFAULTS.crashThreshold,
      changeLag: ENTROPY_DEFAULTS.changeLag,
      changePercentile: ENTROPY_DEFAULTS.changePercentile,
      correlationHorizons: [...ENTROPY_DEFAULTS.correlationHorizons],
    };
  }

  window(window: number): this {
    this.params.window = window;
    return this;
  }

  thresholdPercentile(percentile: number): this {
    this.params.thresholdPercentile = percentile;
    return this;
  }

  holdingPeriod(days: number): this {
    this.params.holdingPeriod = days;
    return this;
  }

  trainingRange(range: DateRange): this {
    this.params.trainingRange = { ...range };
    return this;
  }

  testingRange(range: DateRange): this {
    this.params.testingRange = { ...range };
    return this;
  }

  universeSize(size: number): this {
    this.params.universeSize = size;
    return this;
  }

  tradeModes(modes: TradeMode[]): this {
    this.params.tradeModes = [...modes];
    return this;
  }

  addMarket(market: MarketConfig): this {
    this.marketList.push(market);
    return this;
  }

  volatility(config: VolatilityConfig | null): this {
    this.volatilityConfig = config;
    return this;
  }

  /**
   * Apply partial overrides (API body / CLI flags). Undefined keys keep
   * the current value.
   */
  overrides(o: StudyOverrides): this {
    const next = { ...this.params };
    for (const [key, value] of Object.entries(o)) {
      if (value !== undefined) Object.assign(next, { [key]: value });
    }
    this.params = next;
    return this;
  }

  build(): StudyConfig {
    const p = this.params;
    const testingRange = p.testingRange ?? { from: ENTROPY_DEFAULTS.testingFrom, to: todayUtc() };
    const problems: string[] = [];

    if (!Number.isInteger(p.window) || p.window < 2) problems.push('window must be an integer >= 2');
    if (!(p.thresholdPercentile >= 0 && p.thresholdPercentile <= 100)) {
      problems.push('thresholdPercentile must be within [0, 100]');
    }
    if (!Number.isInteger(p.holdingPeriod) || p.holdingPeriod < 1) {
      problems.push('holdingPeriod must be an integer >= 1');
    }
    if (!Number.isInteger(p.universeSize) || p.universeSize < 2) {
      problems.push('universeSize must be an integer >= 2');
    }
    if (p.tradeModes.length === 0 || p.tradeModes.some(m => !TRADE_MODES.includes(m))) {
      problems.push(`tradeModes must be a non-empty subset of ${TRADE_MODES.join(', ')}`);
    }
    if (!Number.isInteger(p.weeklyCheckDay) || p.weeklyCheckDay < 0 || p.weeklyCheckDay > 6) {
      problems.push('weeklyCheckDay must be an integer within [0, 6]');
    }
    if (!(p.minCoverage > 0 && p.minCoverage <= 1)) problems.push('minCoverage must be within (0, 1]');
    if (!Number.isInteger(p.minInstruments) || p.minInstruments < 2) {
      problems.push('minInstruments must be an integer >= 2');
    }
    if (!(p.ridge >= 0)) problems.push('ridge must be >= 0');
    if (!(p.pivotTolerance >= 0)) problems.push('pivotTolerance must be >= 0');
    if (p.sensitivityPercentiles.some(x => !(x >= 0 && x <= 100))) {
      problems.push('sensitivityPercentiles must be within [0, 100]');
    }
    if (!(p.crashThreshold < 0)) problems.push('crashThreshold must be < 0');
    if (!Number.isInteger(p.changeLag) || p.changeLag < 1) problems.push('changeLag must be an integer >= 1');
    if (!(p.changePercentile >= 0 && p.changePercentile <= 100)) {
      problems.push('changePercentile must be within [0, 100]');
    }
    if (p.correlationHorizons.some(h => !Number.isInteger(h) || h < 1)) {
      problems.push('correlationHorizons must be integers >= 1');
    }

    for (const [label, range] of [['trainingRange', p.trainingRange], ['testingRange', testingRange]] as const) {
      if (!isValidDate(range.from) || !isValidDate(range.to)) {
        problems.push(`${label} dates must be valid YYYY-MM-DD`);
      } else if (range.from > range.to) {
        problems.push(`${label}.from must not be after ${label}.to`);
      }
    }

    if (this.marketList.length === 0) problems.push('at least one market is required');
    const keys = this.marketList.map(m => m.key);
    if (new Set(keys).size !== keys.length) problems.push('duplicate market keys');

    if (problems.length > 0) throw new ConfigValidationError(problems);

    if (p.trainingRange.to >= testingRange.from) {
      throw new LookaheadViolationError(
        `Training range must end before the testing range starts (${p.trainingRange.to} >= ${testingRange.from})`,
        { trainingRange: p.trainingRange, testingRange }
      );
    }

    return {
      ...p,
      trainingRange: { ...p.trainingRange },
      testingRange: { ...testingRange },
      tradeModes: [...p.tradeModes],
      sensitivityPercentiles: [...p.sensitivityPercentiles],
      correlationHorizons: [...p.correlationHorizons],
      markets: this.marketList.map(m => ({ ...m, tickers: [...m.tickers] })),
      volatility: this.volatilityConfig ? { ...this.volatilityConfig } : null,
    };
  }
}
