/**
 * ENTROPY MODULE — Entropy Artifact Store
 *
 * Persists the derived (date, entropy) series per market so a rerun with
 * unchanged inputs skips the rolling computation. Every parameter that
 * changes a value or a gap is part of the key.
 *
 * File: <cacheDir>/<market>/entropy_<hash>.csv
 * header: date,entropy,status   (invalid rows keep an empty entropy cell)
 */

import fs from 'fs';
import path from 'path';
import { createHash } from 'crypto';
import Bottleneck from 'bottleneck';
import { parse } from 'csv-parse/sync';
import type { DateRange, EntropyPoint, EntropySeries } from '../entropy.types.js';

export interface EntropyArtifactKey {
  market: string;
  window: number;
  ridge: number;
  pivotTolerance: number;
  range: DateRange;
  tickers: readonly string[];
}

export interface EntropyStore {
  load(key: EntropyArtifactKey): Promise<EntropySeries | null>;
  save(key: EntropyArtifactKey, series: EntropySeries): Promise<void>;
}

export function entropyArtifactHash(key: EntropyArtifactKey): string {
  const payload = JSON.stringify({
    window: key.window,
    ridge: key.ridge,
    pivotTolerance: key.pivotTolerance,
    range: key.range,
    tickers: key.tickers,
  });
  return createHash('sha1').update(payload).digest('hex').slice(0, 16);
}

export class InMemoryEntropyStore implements EntropyStore {
  private readonly store = new Map<string, EntropySeries>();

  async load(key: EntropyArtifactKey): Promise<EntropySeries | null> {
    return this.store.get(`${key.market}/${entropyArtifactHash(key)}`) ?? null;
  }

  async save(key: EntropyArtifactKey, series: EntropySeries): Promise<void> {
    this.store.set(`${key.market}/${entropyArtifactHash(key)}`, series);
  }
}

function toEntropyPoint(record: unknown): EntropyPoint | null {
  if (typeof record !== 'object' || record === null) return null;
  const date = 'date' in record ? record.date : undefined;
  const status = 'status' in record ? record.status : undefined;
  const raw = 'entropy' in record ? record.entropy : undefined;
  if (typeof date !== 'string') return null;

  if (status === 'DEGENERATE_CORRELATION' || status === 'ZERO_VARIANCE') {
    return { date, valid: false, value: null, reason: status };
  }
  const value = typeof raw === 'string' && raw.length > 0 ? Number(raw) : NaN;
  if (!Number.isFinite(value)) return null;
  return { date, valid: true, value };
}

export class FileEntropyStore implements EntropyStore {
  private readonly writer = new Bottleneck({ maxConcurrent: 1 });

  constructor(private readonly cacheDir: string) {}

  filePath(key: EntropyArtifactKey): string {
    return path.join(this.cacheDir, key.market, `entropy_${entropyArtifactHash(key)}.csv`);
  }

  async load(key: EntropyArtifactKey): Promise<EntropySeries | null> {
    const filePath = this.filePath(key);
    if (!fs.existsSync(filePath)) return null;

    const records: unknown = parse(fs.readFileSync(filePath, 'utf-8'), {
      columns: true,
      skip_empty_lines: true,
      trim: true,
    });
    if (!Array.isArray(records)) return null;

    const points: EntropyPoint[] = [];
    for (const record of records) {
      const point = toEntropyPoint(record);
      // damaged artifact: recompute
      if (!point) return null;
      points.push(point);
    }

    return { market: key.market, window: key.window, tickers: [...key.tickers], points };
  }

  async save(key: EntropyArtifactKey, series: EntropySeries): Promise<void> {
    const filePath = this.filePath(key);
    await this.writer.schedule(async () => {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      const lines = ['date,entropy,status'];
      for (const p of series.points) {
        lines.push(p.valid ? `${p.date},${p.value},ok` : `${p.date},,${p.reason}`);
      }
      const tmpPath = `${filePath}.tmp-${process.pid}-${Date.now()}`;
      fs.writeFileSync(tmpPath, lines.join('\n') + '\n', 'utf-8');
      fs.renameSync(tmpPath, filePath);
    });
  }
}
