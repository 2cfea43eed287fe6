/**
 * ENTROPY MODULE — Yahoo Finance Chart Provider
 *
 * Daily adjusted closes from the unofficial chart API (no key required).
 * Requests are throttled through a Bottleneck limiter. Network errors,
 * HTTP 429 and 5xx are retried with exponential backoff; once the
 * attempts are spent the fetch fails with SourceFetchError.
 * HTTP 404 or an empty chart means DataUnavailableError.
 */

import axios, { type AxiosRequestConfig } from 'axios';
import Bottleneck from 'bottleneck';
import type { PriceSourceProvider } from './provider.types.js';
import type { DateRange, PricePoint } from '../../entropy.types.js';
import { DataUnavailableError, SourceFetchError, errorMessage } from '../../entropy.errors.js';
import { fromUtcMs, inRange, toUtcMs } from '../../utils/dates.js';
import { silentLogger, type EntropyLogger } from '../../utils/logger.js';

export interface ChartHttpClient {
  get(url: string, config?: AxiosRequestConfig): Promise<{ status: number; data: unknown }>;
}

export interface RetryPolicy {
  attempts: number;
  backoffMs: number;
  maxBackoffMs: number;
}

export interface YahooProviderOptions {
  baseURL?: string;
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  /** ms between requests */
  minTimeMs?: number;
  maxConcurrent?: number;
  http?: ChartHttpClient;
  sleep?: (ms: number) => Promise<void>;
  logger?: EntropyLogger;
}

export const DEFAULT_RETRY: RetryPolicy = {
  attempts: 4,
  backoffMs: 1000,
  maxBackoffMs: 15000,
};

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.backoffMs * Math.pow(2, attempt - 1), policy.maxBackoffMs);
}

// ═══════════════════════════════════════════════════════════════
// RESPONSE PARSING
// ═══════════════════════════════════════════════════════════════

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

function firstRecord(x: unknown): Record<string, unknown> | null {
  return Array.isArray(x) && isRecord(x[0]) ? x[0] : null;
}

function numberArray(x: unknown): (number | null)[] | null {
  if (!Array.isArray(x)) return null;
  return x.map(v => (typeof v === 'number' && Number.isFinite(v) ? v : null));
}

/**
 * Parse a chart API body into price points. Throws DataUnavailableError
 * for "Not Found" bodies and charts without usable closes.
 */
export function parseChartResponse(ticker: string, body: unknown, range: DateRange): PricePoint[] {
  const chart = isRecord(body) && isRecord(body.chart) ? body.chart : null;
  if (!chart) throw new DataUnavailableError(ticker, `Unexpected chart body for ${ticker}`);

  if (isRecord(chart.error)) {
    const description = typeof chart.error.description === 'string' ? chart.error.description : 'chart error';
    throw new DataUnavailableError(ticker, `${ticker}: ${description}`);
  }

  const result = firstRecord(chart.result);
  const timestamps = numberArray(result?.timestamp);
  if (!result || !timestamps || timestamps.length === 0) {
    throw new DataUnavailableError(ticker, `No bars for ${ticker}`);
  }

  const meta = isRecord(result.meta) ? result.meta : {};
  const gmtOffset = typeof meta.gmtoffset === 'number' ? meta.gmtoffset : 0;

  const indicators = isRecord(result.indicators) ? result.indicators : {};
  const adj = firstRecord(indicators.adjclose);
  const quote = firstRecord(indicators.quote);
  const closes = numberArray(adj?.adjclose) ?? numberArray(quote?.close);
  if (!closes) throw new DataUnavailableError(ticker, `No closes for ${ticker}`);

  // Exchange-local trading day; duplicates keep the last bar
  const byDate = new Map<string, number>();
  for (let i = 0; i < timestamps.length; i++) {
    const ts = timestamps[i];
    const close = closes[i];
    if (ts === null || close === null || close === undefined || close <= 0) continue;
    const date = fromUtcMs((ts + gmtOffset) * 1000);
    if (!inRange(date, range)) continue;
    byDate.set(date, close);
  }

  if (byDate.size === 0) throw new DataUnavailableError(ticker, `No closes for ${ticker} in range`);

  return [...byDate.entries()]
    .sort((a, b) => a[0].localeCompare(b[0]))
    .map(([date, adjustedClose]) => ({ date, ticker, adjustedClose }));
}

// ═══════════════════════════════════════════════════════════════
// PROVIDER
// ═══════════════════════════════════════════════════════════════

type AttemptOutcome =
  | { kind: 'ok'; points: PricePoint[] }
  | { kind: 'transient'; reason: string }
  | { kind: 'fatal'; reason: string };

export class YahooPriceProvider implements PriceSourceProvider {
  readonly name = 'yahoo';
  private readonly http: ChartHttpClient;
  private readonly limiter: Bottleneck;
  private readonly retry: RetryPolicy;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: EntropyLogger;

  constructor(options: YahooProviderOptions = {}) {
    this.http = options.http ?? axios.create({
      baseURL: options.baseURL ?? 'https://query1.finance.yahoo.com',
      timeout: options.timeoutMs ?? 15000,
      headers: {
        'User-Agent': 'Mozilla/5.0 (compatible; MarketEntropy/1.0)',
        Accept: 'application/json',
      },
    });
    this.limiter = new Bottleneck({
      minTime: options.minTimeMs ?? 400,
      maxConcurrent: options.maxConcurrent ?? 2,
    });
    this.retry = { ...DEFAULT_RETRY, ...options.retry };
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
    this.logger = options.logger ?? silentLogger;
  }

  async fetchDaily(ticker: string, range: DateRange): Promise<PricePoint[]> {
    let lastReason = 'no attempt made';

    for (let attempt = 1; attempt <= this.retry.attempts; attempt++) {
      const outcome = await this.limiter.schedule(() => this.attempt(ticker, range));

      if (outcome.kind === 'ok') return outcome.points;
      if (outcome.kind === 'fatal') throw new SourceFetchError(ticker, attempt, outcome.reason);

      lastReason = outcome.reason;
      if (attempt < this.retry.attempts) {
        const delay = backoffDelay(this.retry, attempt);
        this.logger.warn(`[Yahoo] ${ticker} attempt ${attempt} failed (${outcome.reason}), retrying in ${delay}ms`);
        await this.sleep(delay);
      }
    }

    throw new SourceFetchError(ticker, this.retry.attempts, lastReason);
  }

  private async attempt(ticker: string, range: DateRange): Promise<AttemptOutcome> {
    const period1 = Math.floor(toUtcMs(range.from) / 1000);
    // period2 is exclusive; extend one day so range.to is included
    const period2 = Math.floor(toUtcMs(range.to) / 1000) + 86400;

    let res: { status: number; data: unknown };
    try {
      res = await this.http.get(`/v8/finance/chart/${encodeURIComponent(ticker)}`, {
        params: { period1, period2, interval: '1d', events: 'div,splits', includeAdjustedClose: true },
        validateStatus: () => true,
      });
    } catch (err) {
      return { kind: 'transient', reason: errorMessage(err) };
    }

    if (res.status === 404) {
      throw new DataUnavailableError(ticker, `${ticker}: not found at source`);
    }
    if (res.status === 429 || res.status >= 500) {
      return { kind: 'transient', reason: `HTTP ${res.status}` };
    }
    if (res.status !== 200) {
      return { kind: 'fatal', reason: `HTTP ${res.status}` };
    }

    return { kind: 'ok', points: parseChartResponse(ticker, res.data, range) };
  }
}
