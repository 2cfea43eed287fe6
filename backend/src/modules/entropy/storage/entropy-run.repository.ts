/**
 * ENTROPY RUN REPOSITORY — stored study runs
 * ==========================================
 *
 * MongoEntropyRunRepository persists to `entropy_runs`; the in-memory
 * repository serves tests and runs without MONGO_URL.
 */

import type { StudyConfig } from '../entropy.config.js';
import type { CrossMarketReport } from '../entropy.types.js';
import { entropyRunModel } from './entropy-run.model.js';

export interface StoredEntropyRun {
  config: StudyConfig;
  report: CrossMarketReport;
}

export interface EntropyRunSummary {
  runId: string;
  generatedAt: string;
  source: string;
  markets: string[];
  failedMarkets: string[];
  durationMs: number;
}

export interface EntropyRunRepository {
  readonly name: string;
  save(run: StoredEntropyRun): Promise<void>;
  list(limit: number): Promise<EntropyRunSummary[]>;
  get(runId: string): Promise<StoredEntropyRun | null>;
}

export function summarizeRun(report: CrossMarketReport): EntropyRunSummary {
  return {
    runId: report.runId,
    generatedAt: report.generatedAt,
    source: report.source,
    markets: report.markets.map(m => m.market),
    failedMarkets: report.failures.map(f => f.market),
    durationMs: report.durationMs,
  };
}

// ═══════════════════════════════════════════════════════════════
// IN-MEMORY
// ═══════════════════════════════════════════════════════════════

export class InMemoryEntropyRunRepository implements EntropyRunRepository {
  readonly name = 'memory';
  private readonly runs = new Map<string, StoredEntropyRun>();

  async save(run: StoredEntropyRun): Promise<void> {
    this.runs.set(run.report.runId, run);
  }

  async list(limit: number): Promise<EntropyRunSummary[]> {
    return [...this.runs.values()]
      .map(r => summarizeRun(r.report))
      .sort((a, b) => (a.generatedAt < b.generatedAt ? 1 : a.generatedAt > b.generatedAt ? -1 : 0))
      .slice(0, limit);
  }

  async get(runId: string): Promise<StoredEntropyRun | null> {
    return this.runs.get(runId) ?? null;
  }
}

// ═══════════════════════════════════════════════════════════════
// MONGO
// ═══════════════════════════════════════════════════════════════

export class MongoEntropyRunRepository implements EntropyRunRepository {
  readonly name = 'mongo';

  async save(run: StoredEntropyRun): Promise<void> {
    const summary = summarizeRun(run.report);
    await entropyRunModel().updateOne(
      { runId: summary.runId },
      {
        $set: {
          runId: summary.runId,
          generatedAt: new Date(summary.generatedAt),
          source: summary.source,
          markets: summary.markets,
          failedMarkets: summary.failedMarkets,
          durationMs: summary.durationMs,
          config: run.config,
          report: run.report,
        },
      },
      { upsert: true }
    );
  }

  async list(limit: number): Promise<EntropyRunSummary[]> {
    const docs = await entropyRunModel()
      .find({}, { runId: 1, generatedAt: 1, source: 1, markets: 1, failedMarkets: 1, durationMs: 1 })
      .sort({ generatedAt: -1 })
      .limit(limit)
      .lean();

    return docs.map(d => ({
      runId: d.runId,
      generatedAt: d.generatedAt.toISOString(),
      source: d.source,
      markets: d.markets,
      failedMarkets: d.failedMarkets,
      durationMs: d.durationMs,
    }));
  }

  async get(runId: string): Promise<StoredEntropyRun | null> {
    const doc = await entropyRunModel().findOne({ runId }).lean();
    return doc ? { config: doc.config, report: doc.report } : null;
  }
}
