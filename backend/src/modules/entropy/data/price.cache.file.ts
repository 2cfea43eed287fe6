/**
 * ENTROPY MODULE — File-backed Price Cache
 *
 * Layout:
 *   <cacheDir>/<market>/prices_<from>_<to>.csv
 *   header: date,ticker,adjusted_close
 *   <cacheDir>/<market>/missing_<from>_<to>.csv
 *   header: ticker,reason
 *
 * One file per market namespace and date range. Writes go through a
 * single-slot limiter so concurrent pipelines never interleave a
 * read-modify-write of the same file.
 */

import fs from 'fs';
import path from 'path';
import Bottleneck from 'bottleneck';
import { parse } from 'csv-parse/sync';
import type { PriceCache, PriceCacheKey } from './price.cache.js';
import type { PricePoint, PriceSeries } from '../entropy.types.js';
import { formatRange } from '../utils/dates.js';

const HEADER = 'date,ticker,adjusted_close';
const MISSING_HEADER = 'ticker,reason';

type FileRows = Map<string, PricePoint[]>;

function toPricePoint(record: unknown): PricePoint | null {
  if (typeof record !== 'object' || record === null) return null;
  const date = 'date' in record ? record.date : undefined;
  const ticker = 'ticker' in record ? record.ticker : undefined;
  const close = 'adjusted_close' in record ? Number(record.adjusted_close) : NaN;
  if (typeof date !== 'string' || typeof ticker !== 'string') return null;
  if (!Number.isFinite(close) || close <= 0) return null;
  return { date, ticker, adjustedClose: close };
}

export class FilePriceCache implements PriceCache {
  readonly name = 'file';
  private readonly writer = new Bottleneck({ maxConcurrent: 1 });
  private readonly parsed = new Map<string, FileRows>();
  private readonly parsedMissing = new Map<string, Map<string, string>>();

  constructor(private readonly cacheDir: string) {}

  filePath(key: Pick<PriceCacheKey, 'market' | 'range'>): string {
    return path.join(this.cacheDir, key.market, `prices_${formatRange(key.range)}.csv`);
  }

  missingPath(key: Pick<PriceCacheKey, 'market' | 'range'>): string {
    return path.join(this.cacheDir, key.market, `missing_${formatRange(key.range)}.csv`);
  }

  async get(key: PriceCacheKey): Promise<PriceSeries | null> {
    const rows = this.readFile(this.filePath(key));
    const points = rows.get(key.ticker);
    if (!points || points.length === 0) return null;
    return { market: key.market, ticker: key.ticker, points };
  }

  async has(key: PriceCacheKey): Promise<boolean> {
    return (await this.get(key)) !== null;
  }

  async put(key: PriceCacheKey, series: PriceSeries): Promise<void> {
    const filePath = this.filePath(key);
    await this.writer.schedule(async () => {
      const rows = new Map(this.readFile(filePath));
      rows.set(key.ticker, [...series.points]);
      this.writeFile(filePath, rows);
      this.parsed.set(filePath, rows);
    });
  }

  async getMissing(key: PriceCacheKey): Promise<string | null> {
    return this.readMissing(this.missingPath(key)).get(key.ticker) ?? null;
  }

  async putMissing(key: PriceCacheKey, reason: string): Promise<void> {
    const filePath = this.missingPath(key);
    await this.writer.schedule(async () => {
      const entries = new Map(this.readMissing(filePath));
      entries.set(key.ticker, reason);

      const lines = [MISSING_HEADER];
      for (const ticker of [...entries.keys()].sort()) {
        lines.push(`${ticker},${quote(entries.get(ticker) ?? '')}`);
      }
      writeAtomic(filePath, lines);
      this.parsedMissing.set(filePath, entries);
    });
  }

  private readMissing(filePath: string): Map<string, string> {
    const memo = this.parsedMissing.get(filePath);
    if (memo) return memo;

    const entries = new Map<string, string>();
    if (fs.existsSync(filePath)) {
      const records: unknown = parse(fs.readFileSync(filePath, 'utf-8'), {
        columns: true,
        skip_empty_lines: true,
        trim: true,
      });
      if (Array.isArray(records)) {
        for (const record of records) {
          if (typeof record !== 'object' || record === null) continue;
          const ticker = 'ticker' in record ? record.ticker : undefined;
          const reason = 'reason' in record ? record.reason : undefined;
          if (typeof ticker === 'string' && typeof reason === 'string') entries.set(ticker, reason);
        }
      }
    }

    this.parsedMissing.set(filePath, entries);
    return entries;
  }

  private readFile(filePath: string): FileRows {
    const memo = this.parsed.get(filePath);
    if (memo) return memo;

    const rows: FileRows = new Map();
    if (!fs.existsSync(filePath)) return rows;

    const records: unknown = parse(fs.readFileSync(filePath, 'utf-8'), {
      columns: true,
      skip_empty_lines: true,
      trim: true,
    });
    if (Array.isArray(records)) {
      for (const record of records) {
        const point = toPricePoint(record);
        if (!point) continue;
        const list = rows.get(point.ticker) ?? [];
        list.push(point);
        rows.set(point.ticker, list);
      }
    }
    for (const list of rows.values()) list.sort((a, b) => a.date.localeCompare(b.date));

    this.parsed.set(filePath, rows);
    return rows;
  }

  private writeFile(filePath: string, rows: FileRows): void {
    const lines = [HEADER];
    const tickers = [...rows.keys()].sort();
    for (const ticker of tickers) {
      for (const p of rows.get(ticker) ?? []) {
        lines.push(`${p.date},${ticker},${p.adjustedClose}`);
      }
    }

    writeAtomic(filePath, lines);
  }
}

function quote(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

function writeAtomic(filePath: string, lines: string[]): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.tmp-${process.pid}-${Date.now()}`;
  fs.writeFileSync(tmpPath, lines.join('\n') + '\n', 'utf-8');
  fs.renameSync(tmpPath, filePath);
}
