/**
 * ENTROPY MODULE — Universe Loader
 *
 * Cache first, source on miss. A ticker the source has no data for is
 * excluded and the batch continues; every other failure aborts the batch.
 * The no-data answer is cached too, so a rerun over the same range does not
 * ask the source again.
 * Required instruments (benchmark, volatility index) go through
 * loadRequired, which lets DataUnavailableError propagate.
 */

import type { PriceCache } from './price.cache.js';
import type { PriceSourceProvider } from './providers/provider.types.js';
import type { DateRange, ExcludedInstrument, PriceSeries } from '../entropy.types.js';
import { DataUnavailableError } from '../entropy.errors.js';
import { silentLogger, type EntropyLogger } from '../utils/logger.js';

export interface PriceLoaderDeps {
  cache: PriceCache;
  provider: PriceSourceProvider;
  logger?: EntropyLogger;
}

export interface LoadedSeries {
  series: PriceSeries;
  fromCache: boolean;
}

export interface UniverseLoadResult {
  series: Map<string, PriceSeries>;
  excluded: ExcludedInstrument[];
  fetched: number;
  cached: number;
}

type LoadOutcome =
  | { ticker: string; ok: true; loaded: LoadedSeries }
  | { ticker: string; ok: false; reason: string };

export async function loadSeries(
  deps: PriceLoaderDeps,
  namespace: string,
  ticker: string,
  range: DateRange
): Promise<LoadedSeries> {
  const key = { market: namespace, ticker, range };
  const hit = await deps.cache.get(key);
  if (hit) return { series: hit, fromCache: true };

  const missing = await deps.cache.getMissing(key);
  if (missing !== null) throw new DataUnavailableError(ticker, missing);

  const recordMissing = async (err: DataUnavailableError): Promise<never> => {
    await deps.cache.putMissing(key, err.message);
    throw err;
  };

  const points = await deps.provider.fetchDaily(ticker, range).catch(async (err: unknown) => {
    if (err instanceof DataUnavailableError) return recordMissing(err);
    throw err;
  });
  if (points.length === 0) return recordMissing(new DataUnavailableError(ticker));

  const series: PriceSeries = { market: namespace, ticker, points };
  await deps.cache.put(key, series);
  return { series, fromCache: false };
}

export async function loadRequired(
  deps: PriceLoaderDeps,
  namespace: string,
  ticker: string,
  range: DateRange
): Promise<PriceSeries> {
  const { series } = await loadSeries(deps, namespace, ticker, range);
  return series;
}

export async function loadUniverse(
  deps: PriceLoaderDeps,
  namespace: string,
  tickers: readonly string[],
  range: DateRange
): Promise<UniverseLoadResult> {
  const logger = deps.logger ?? silentLogger;

  const outcomes = await Promise.all(
    tickers.map(async (ticker): Promise<LoadOutcome> => {
      try {
        return { ticker, ok: true, loaded: await loadSeries(deps, namespace, ticker, range) };
      } catch (err) {
        if (err instanceof DataUnavailableError) {
          logger.warn(`[Entropy] ${namespace}: excluding ${ticker} (${err.message})`);
          return { ticker, ok: false, reason: err.message };
        }
        throw err;
      }
    })
  );

  const result: UniverseLoadResult = { series: new Map(), excluded: [], fetched: 0, cached: 0 };
  for (const o of outcomes) {
    if (o.ok) {
      result.series.set(o.ticker, o.loaded.series);
      if (o.loaded.fromCache) result.cached++;
      else result.fetched++;
    } else {
      result.excluded.push({ ticker: o.ticker, reason: 'DATA_UNAVAILABLE', detail: o.reason });
    }
  }

  logger.info(
    `[Entropy] ${namespace}: loaded ${result.series.size}/${tickers.length} instruments ` +
    `(cache ${result.cached}, fetched ${result.fetched}, excluded ${result.excluded.length})`
  );
  return result;
}
