/**
 * ENTROPY MODULE — Study Service
 *
 * Assembles a StudyConfig from the market catalog and per-run overrides,
 * runs the cross-market aggregator and stores the run.
 * Shared by the HTTP routes and the CLI.
 */

import { StudyConfigBuilder, type StudyConfig, type StudyOverrides } from './entropy.config.js';
import type { CrossMarketReport } from './entropy.types.js';
import { RunNotFoundError } from './entropy.errors.js';
import { selectMarkets, type MarketCatalog } from './data/markets.catalog.js';
import type { PriceCache } from './data/price.cache.js';
import type { EntropyStore } from './data/entropy.store.js';
import type { PriceSourceProvider } from './data/providers/provider.types.js';
import { CrossMarketAggregator } from './pipeline/cross-market.aggregator.js';
import type {
  EntropyRunRepository,
  EntropyRunSummary,
  StoredEntropyRun,
} from './storage/entropy-run.repository.js';
import { silentLogger, type EntropyLogger } from './utils/logger.js';

export interface EntropyServiceDeps {
  catalog: MarketCatalog;
  cache: PriceCache;
  provider: PriceSourceProvider;
  entropyStore: EntropyStore;
  repository: EntropyRunRepository;
  logger?: EntropyLogger;
}

export interface StudyRequest extends StudyOverrides {
  /** market keys; all catalog markets when omitted */
  markets?: string[];
  /** include the volatility-index baseline (default true) */
  volatility?: boolean;
}

export class EntropyStudyService {
  private readonly aggregator: CrossMarketAggregator;

  constructor(private readonly deps: EntropyServiceDeps) {
    this.aggregator = new CrossMarketAggregator({
      cache: deps.cache,
      provider: deps.provider,
      entropyStore: deps.entropyStore,
      logger: deps.logger ?? silentLogger,
    });
  }

  get catalog(): MarketCatalog {
    return this.deps.catalog;
  }

  buildStudy(request: StudyRequest = {}): StudyConfig {
    const { markets, volatility, ...overrides } = request;
    const builder = new StudyConfigBuilder()
      .overrides(overrides)
      .volatility(volatility === false ? null : this.deps.catalog.volatility);
    for (const m of selectMarkets(this.deps.catalog, markets)) builder.addMarket(m);
    return builder.build();
  }

  async run(request: StudyRequest = {}): Promise<CrossMarketReport> {
    const config = this.buildStudy(request);
    const report = await this.aggregator.run(config, { source: this.deps.provider.name });
    await this.deps.repository.save({ config, report });
    return report;
  }

  listRuns(limit: number): Promise<EntropyRunSummary[]> {
    return this.deps.repository.list(limit);
  }

  async getRun(runId: string): Promise<StoredEntropyRun> {
    const run = await this.deps.repository.get(runId);
    if (!run) throw new RunNotFoundError(runId);
    return run;
  }
}
