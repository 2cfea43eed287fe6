/**
 * Environment configuration.
 * Values come from process.env (loaded from .env by the entrypoints).
 */

function str(name: string, fallback: string): string {
  const v = process.env[name];
  return v === undefined || v === '' ? fallback : v;
}

function int(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const v = Number(raw);
  if (!Number.isInteger(v) || v < 0) {
    throw new Error(`[Env] ${name} must be a non-negative integer, got "${raw}"`);
  }
  return v;
}

export type DataSource = 'yahoo' | 'synthetic';

function dataSource(): DataSource {
  const v = str('ENTROPY_DATA_SOURCE', 'yahoo');
  if (v !== 'yahoo' && v !== 'synthetic') {
    throw new Error(`[Env] ENTROPY_DATA_SOURCE must be "yahoo" or "synthetic", got "${v}"`);
  }
  return v;
}

export const env = {
  NODE_ENV: str('NODE_ENV', 'development'),
  PORT: int('PORT', 8003),
  HOST: str('HOST', '0.0.0.0'),
  LOG_LEVEL: str('LOG_LEVEL', 'info'),
  CORS_ORIGINS: str('CORS_ORIGINS', '*'),

  // empty = in-memory run storage
  MONGO_URL: str('MONGO_URL', ''),
  DB_NAME: str('DB_NAME', 'market_entropy'),

  ENTROPY_CACHE_DIR: str('ENTROPY_CACHE_DIR', 'data/entropy-cache'),
  ENTROPY_DATA_SOURCE: dataSource(),

  YAHOO_BASE_URL: str('YAHOO_BASE_URL', 'https://query1.finance.yahoo.com'),
  HTTP_TIMEOUT_MS: int('HTTP_TIMEOUT_MS', 15000),
  FETCH_RETRY_ATTEMPTS: int('FETCH_RETRY_ATTEMPTS', 4),
  FETCH_BACKOFF_MS: int('FETCH_BACKOFF_MS', 1000),
  FETCH_MAX_BACKOFF_MS: int('FETCH_MAX_BACKOFF_MS', 15000),
  FETCH_MIN_TIME_MS: int('FETCH_MIN_TIME_MS', 400),
};

export type Env = typeof env;
