/**
 * Market catalog: instrument universes per market, read from
 * backend/data/entropy/markets.json.
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { MarketConfigBuilder, type MarketConfig, type VolatilityConfig } from '../entropy.config.js';
import { ConfigValidationError } from '../entropy.errors.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const MARKETS_CATALOG_PATH = path.resolve(__dirname, '../../../../data/entropy/markets.json');

export interface MarketCatalog {
  markets: MarketConfig[];
  volatility: VolatilityConfig;
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

function readString(obj: Record<string, unknown>, key: string, where: string): string {
  const v = obj[key];
  if (typeof v !== 'string' || v.length === 0) {
    throw new ConfigValidationError([`${where}.${key} must be a non-empty string`]);
  }
  return v;
}

export function parseMarketCatalog(raw: unknown): MarketCatalog {
  if (!isRecord(raw) || !Array.isArray(raw.markets) || !isRecord(raw.volatility)) {
    throw new ConfigValidationError(['catalog must have "markets" and "volatility"']);
  }

  const markets = raw.markets.map((m, i) => {
    if (!isRecord(m) || !Array.isArray(m.tickers)) {
      throw new ConfigValidationError([`markets[${i}] must have a tickers array`]);
    }
    const tickers = m.tickers.filter((t): t is string => typeof t === 'string');
    return new MarketConfigBuilder(readString(m, 'key', `markets[${i}]`))
      .name(readString(m, 'name', `markets[${i}]`))
      .benchmark(readString(m, 'benchmark', `markets[${i}]`))
      .namespace(readString(m, 'namespace', `markets[${i}]`))
      .tickers(tickers)
      .build();
  });

  const volatility: VolatilityConfig = {
    ticker: readString(raw.volatility, 'ticker', 'volatility'),
    name: readString(raw.volatility, 'name', 'volatility'),
    namespace: readString(raw.volatility, 'namespace', 'volatility'),
  };

  return { markets, volatility };
}

let cached: MarketCatalog | null = null;

export function loadMarketCatalog(filePath: string = MARKETS_CATALOG_PATH): MarketCatalog {
  if (cached && filePath === MARKETS_CATALOG_PATH) return cached;
  const catalog = parseMarketCatalog(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
  if (filePath === MARKETS_CATALOG_PATH) cached = catalog;
  return catalog;
}

/**
 * Pick markets by key; unknown keys are a config error.
 */
export function selectMarkets(catalog: MarketCatalog, keys?: string[]): MarketConfig[] {
  if (!keys || keys.length === 0) return catalog.markets;
  const unknown = keys.filter(k => !catalog.markets.some(m => m.key === k));
  if (unknown.length > 0) {
    throw new ConfigValidationError([`unknown markets: ${unknown.join(', ')}`]);
  }
  return catalog.markets.filter(m => keys.includes(m.key));
}
