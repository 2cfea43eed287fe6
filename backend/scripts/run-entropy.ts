/**
 * ENTROPY STUDY SCRIPT
 *
 * Runs the cross-market study once, prints the per-market summaries and the
 * comparison table, and writes the full report as JSON.
 *
 * Run: npx tsx backend/scripts/run-entropy.ts [--markets US,EU] [--synthetic]
 *        [--modes overlapping,non_overlapping,weekly] [--window 60]
 *        [--percentile 90] [--holding 30] [--no-volatility] [--out report.json]
 */

import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { env } from '../src/config/env.js';
import { TRADE_MODES } from '../src/modules/entropy/entropy.config.js';
import type { TradeMode } from '../src/modules/entropy/entropy.types.js';
import { ConfigValidationError } from '../src/modules/entropy/entropy.errors.js';
import { createEntropyDeps } from '../src/modules/entropy/entropy.bootstrap.js';
import { EntropyStudyService, type StudyRequest } from '../src/modules/entropy/entropy.service.js';
import { formatReport } from '../src/modules/entropy/pipeline/report.format.js';

function flag(name: string): string | undefined {
  const i = process.argv.indexOf(`--${name}`);
  return i >= 0 ? process.argv[i + 1] : undefined;
}

function intFlag(name: string): number | undefined {
  const raw = flag(name);
  if (raw === undefined) return undefined;
  const v = Number(raw);
  if (!Number.isFinite(v)) throw new ConfigValidationError([`--${name} must be a number`]);
  return v;
}

function isTradeMode(x: string): x is TradeMode {
  return TRADE_MODES.some(m => m === x);
}

function modesFlag(): TradeMode[] | undefined {
  const raw = flag('modes');
  if (raw === undefined) return undefined;
  const modes = raw.split(',').map(s => s.trim());
  const bad = modes.filter(m => !isTradeMode(m));
  if (bad.length > 0) throw new ConfigValidationError([`unknown trade modes: ${bad.join(', ')}`]);
  return modes.filter(isTradeMode);
}

async function run() {
  const synthetic = process.argv.includes('--synthetic');
  const deps = createEntropyDeps(
    { ...env, ENTROPY_DATA_SOURCE: synthetic ? 'synthetic' : env.ENTROPY_DATA_SOURCE },
    console,
    { mongo: false }
  );
  const service = new EntropyStudyService(deps);

  const request: StudyRequest = {
    markets: flag('markets')?.split(',').map(s => s.trim().toUpperCase()),
    volatility: !process.argv.includes('--no-volatility'),
    window: intFlag('window'),
    thresholdPercentile: intFlag('percentile'),
    holdingPeriod: intFlag('holding'),
    tradeModes: modesFlag(),
  };

  console.log(`[Entropy] Source: ${deps.provider.name}`);
  const report = await service.run(request);

  console.log('');
  console.log(formatReport(report));
  console.log('');

  const out = path.resolve(flag('out') ?? path.join(env.ENTROPY_CACHE_DIR, `report_${report.runId}.json`));
  fs.mkdirSync(path.dirname(out), { recursive: true });
  fs.writeFileSync(out, JSON.stringify(report, null, 2));
  console.log(`[Entropy] Report written to ${out}`);

  if (report.markets.length === 0) process.exitCode = 1;
}

run().catch((err) => {
  console.error('[Entropy] Study failed:', err);
  process.exit(1);
});
