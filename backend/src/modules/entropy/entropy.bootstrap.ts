/**
 * Wires the entropy services from environment settings.
 * Used by the server entrypoint and the CLI.
 */

import path from 'path';
import type { Env } from '../../config/env.js';
import { FilePriceCache } from './data/price.cache.file.js';
import { FileEntropyStore } from './data/entropy.store.js';
import { loadMarketCatalog } from './data/markets.catalog.js';
import type { PriceSourceProvider } from './data/providers/provider.types.js';
import { YahooPriceProvider } from './data/providers/yahoo.provider.js';
import { SyntheticPriceProvider } from './data/providers/synthetic.provider.js';
import type { EntropyServiceDeps } from './entropy.service.js';
import {
  InMemoryEntropyRunRepository,
  MongoEntropyRunRepository,
} from './storage/entropy-run.repository.js';
import type { EntropyLogger } from './utils/logger.js';

export type BootstrapEnv = Pick<
  Env,
  | 'ENTROPY_CACHE_DIR'
  | 'ENTROPY_DATA_SOURCE'
  | 'YAHOO_BASE_URL'
  | 'HTTP_TIMEOUT_MS'
  | 'FETCH_RETRY_ATTEMPTS'
  | 'FETCH_BACKOFF_MS'
  | 'FETCH_MAX_BACKOFF_MS'
  | 'FETCH_MIN_TIME_MS'
>;

export function createProvider(env: BootstrapEnv, logger: EntropyLogger): PriceSourceProvider {
  if (env.ENTROPY_DATA_SOURCE === 'synthetic') return new SyntheticPriceProvider();
  return new YahooPriceProvider({
    baseURL: env.YAHOO_BASE_URL,
    timeoutMs: env.HTTP_TIMEOUT_MS,
    minTimeMs: env.FETCH_MIN_TIME_MS,
    retry: {
      attempts: Math.max(1, env.FETCH_RETRY_ATTEMPTS),
      backoffMs: env.FETCH_BACKOFF_MS,
      maxBackoffMs: env.FETCH_MAX_BACKOFF_MS,
    },
    logger,
  });
}

/**
 * File-backed caches under ENTROPY_CACHE_DIR (one directory per source, so
 * synthetic and live prices never mix).
 */
export function createEntropyDeps(
  env: BootstrapEnv,
  logger: EntropyLogger,
  options: { mongo: boolean }
): EntropyServiceDeps {
  const provider = createProvider(env, logger);
  const cacheDir = path.resolve(env.ENTROPY_CACHE_DIR, provider.name);
  return {
    catalog: loadMarketCatalog(),
    cache: new FilePriceCache(cacheDir),
    provider,
    entropyStore: new FileEntropyStore(cacheDir),
    repository: options.mongo ? new MongoEntropyRunRepository() : new InMemoryEntropyRunRepository(),
    logger,
  };
}
