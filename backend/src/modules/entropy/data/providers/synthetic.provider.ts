/**
 * ENTROPY MODULE — Synthetic Price Provider
 *
 * Deterministic offline market: one common factor plus idiosyncratic
 * noise per instrument on a Monday–Friday calendar. Every draw is seeded
 * by (seed, ticker, date), so a given day's return does not depend on the
 * requested range.
 *
 * - index tickers (default: "^" prefix) follow the common factor only
 * - volatility tickers (default: ^VIX) are a level derived from the
 *   trailing absolute common-factor moves
 * - regimes override the factor loadings between two dates, e.g. a
 *   correlation spike with a large common shock and tiny noise
 */

import type { PriceSourceProvider } from './provider.types.js';
import type { DateRange, PricePoint } from '../../entropy.types.js';
import { DataUnavailableError } from '../../entropy.errors.js';
import { businessDays, fromUtcMs, toUtcMs } from '../../utils/dates.js';
import { mulberry32, randn, seedFromString } from '../../utils/random.js';

export interface SyntheticRegime {
  from: string;
  to: string;
  commonVol: number;
  idioVol: number;
}

export interface SyntheticProviderOptions {
  seed?: number;
  /** tickers with data; undefined = any ticker */
  universe?: string[];
  /** tickers that always raise DataUnavailableError */
  missing?: string[];
  /** late listings: no bars before the given date */
  listedFrom?: Record<string, string>;
  /** delistings: no bars on or after the given date */
  delistedFrom?: Record<string, string>;
  indexTickers?: string[];
  volatilityTickers?: string[];
  regimes?: SyntheticRegime[];
  commonVol?: number;
  idioVol?: number;
  drift?: number;
}

const VOL_LOOKBACK = 10;

export class SyntheticPriceProvider implements PriceSourceProvider {
  readonly name = 'synthetic';
  private readonly seed: number;
  private readonly commonVol: number;
  private readonly idioVol: number;
  private readonly drift: number;
  private readonly commonCache = new Map<string, number>();

  constructor(private readonly options: SyntheticProviderOptions = {}) {
    this.seed = options.seed ?? 42;
    this.commonVol = options.commonVol ?? 0.008;
    this.idioVol = options.idioVol ?? 0.012;
    this.drift = options.drift ?? 0.0002;
  }

  async fetchDaily(ticker: string, range: DateRange): Promise<PricePoint[]> {
    if (this.options.missing?.includes(ticker)) {
      throw new DataUnavailableError(ticker, `${ticker}: not available in synthetic source`);
    }
    const kind = this.kindOf(ticker);
    if (kind === 'stock' && this.options.universe && !this.options.universe.includes(ticker)) {
      throw new DataUnavailableError(ticker, `${ticker}: not in synthetic universe`);
    }

    const listedFrom = this.options.listedFrom?.[ticker];
    const delistedFrom = this.options.delistedFrom?.[ticker];
    const days = businessDays(range).filter(
      d => (!listedFrom || d >= listedFrom) && (!delistedFrom || d < delistedFrom)
    );
    if (days.length === 0) throw new DataUnavailableError(ticker, `${ticker}: no bars in range`);

    if (kind === 'volatility') {
      return days.map(date => ({ date, ticker, adjustedClose: this.volatilityLevel(date) }));
    }

    const start = 50 + (seedFromString(`${this.seed}:${ticker}:start`) % 150);
    let price = start;
    return days.map(date => {
      price *= Math.exp(this.dailyReturn(ticker, date, kind));
      return { date, ticker, adjustedClose: price };
    });
  }

  /** Log return of a ticker on a date. */
  dailyReturn(ticker: string, date: string, kind: 'stock' | 'index' = this.stockOrIndex(ticker)): number {
    const regime = this.regimeAt(date);
    const commonVol = regime ? regime.commonVol : this.commonVol;
    const common = this.commonDraw(date);
    if (kind === 'index') return this.drift + commonVol * common;

    const idioVol = regime ? regime.idioVol : this.idioVol;
    const idio = randn(mulberry32(seedFromString(`${this.seed}:${ticker}:${date}`)));
    return this.drift + commonVol * common + idioVol * idio;
  }

  private kindOf(ticker: string): 'stock' | 'index' | 'volatility' {
    const vol = this.options.volatilityTickers ?? ['^VIX'];
    if (vol.includes(ticker)) return 'volatility';
    return this.stockOrIndex(ticker);
  }

  private stockOrIndex(ticker: string): 'stock' | 'index' {
    if (this.options.indexTickers) return this.options.indexTickers.includes(ticker) ? 'index' : 'stock';
    return ticker.startsWith('^') ? 'index' : 'stock';
  }

  private regimeAt(date: string): SyntheticRegime | undefined {
    return this.options.regimes?.find(r => date >= r.from && date <= r.to);
  }

  private commonDraw(date: string): number {
    const hit = this.commonCache.get(date);
    if (hit !== undefined) return hit;
    const z = randn(mulberry32(seedFromString(`${this.seed}:common:${date}`)));
    this.commonCache.set(date, z);
    return z;
  }

  /**
   * Level that rises with the trailing absolute market moves.
   */
  private volatilityLevel(date: string): number {
    let sum = 0;
    let seen = 0;
    let t = toUtcMs(date);
    while (seen < VOL_LOOKBACK) {
      const d = fromUtcMs(t);
      const day = new Date(t).getUTCDay();
      if (day !== 0 && day !== 6) {
        const regime = this.regimeAt(d);
        const vol = regime ? regime.commonVol : this.commonVol;
        sum += Math.abs(vol * this.commonDraw(d));
        seen++;
      }
      t -= 86_400_000;
    }
    return 10 + 1500 * (sum / VOL_LOOKBACK);
  }
}
