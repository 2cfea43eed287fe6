/**
 * ENTROPY ROUTES TESTS
 *
 * Full Fastify app over in-memory stores and the synthetic source,
 * exercised with inject().
 */

import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../../app.js';
import { MarketConfigBuilder } from '../entropy.config.js';
import { InMemoryPriceCache } from '../data/price.cache.js';
import { InMemoryEntropyStore } from '../data/entropy.store.js';
import { SyntheticPriceProvider } from '../data/providers/synthetic.provider.js';
import { InMemoryEntropyRunRepository } from '../storage/entropy-run.repository.js';
import { silentLogger } from '../utils/logger.js';

const STUDY = {
  markets: ['ALPHA'],
  window: 20,
  holdingPeriod: 5,
  trainingRange: { from: '2022-01-01', to: '2022-06-30' },
  testingRange: { from: '2022-07-01', to: '2022-12-31' },
  tradeModes: ['overlapping'],
  minInstruments: 3,
  sensitivityPercentiles: [90],
};

describe('entropy routes', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = buildApp(
      {
        catalog: {
          markets: [
            new MarketConfigBuilder('ALPHA').name('Alpha').benchmark('^ALPHA').tickers(['A1', 'A2', 'A3', 'A4']).build(),
            new MarketConfigBuilder('BETA').name('Beta').benchmark('^BETA').tickers(['B1', 'B2', 'B3']).build(),
          ],
          volatility: { ticker: '^VIX', name: 'Volatility', namespace: 'vix' },
        },
        cache: new InMemoryPriceCache(),
        provider: new SyntheticPriceProvider({ seed: 5 }),
        entropyStore: new InMemoryEntropyStore(),
        repository: new InMemoryEntropyRunRepository(),
        logger: silentLogger,
      },
      { logLevel: false }
    );
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('GET /api/health', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ ok: true, service: 'market-entropy' });
  });

  it('GET /api/entropy/v1/info should list the catalog', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/entropy/v1/info' });
    const body = res.json();

    expect(res.statusCode).toBe(200);
    expect(body.markets).toEqual([
      { key: 'ALPHA', name: 'Alpha', benchmark: '^ALPHA', instruments: 4 },
      { key: 'BETA', name: 'Beta', benchmark: '^BETA', instruments: 3 },
    ]);
    expect(body.tradeModes).toEqual(['overlapping', 'non_overlapping', 'weekly']);
    expect(body.defaults.window).toBe(60);
  });

  it('POST /run should run, store and return the study', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/entropy/v1/run', payload: STUDY });
    expect(res.statusCode).toBe(200);

    const { report } = res.json();
    expect(report.source).toBe('synthetic');
    expect(report.markets).toHaveLength(1);
    expect(report.markets[0].market).toBe('ALPHA');
    expect(report.comparison.map((r: { strategy: string }) => r.strategy)).toEqual(['entropy', 'volatility', 'combined']);

    const list = await app.inject({ method: 'GET', url: '/api/entropy/v1/runs?limit=5' });
    expect(list.json()).toMatchObject({ ok: true, count: 1 });
    expect(list.json().runs[0]).toMatchObject({ runId: report.runId, markets: ['ALPHA'], failedMarkets: [] });

    const stored = await app.inject({ method: 'GET', url: `/api/entropy/v1/runs/${report.runId}` });
    expect(stored.statusCode).toBe(200);
    expect(stored.json().config.window).toBe(20);
    expect(stored.json().report.runId).toBe(report.runId);
  });

  it('POST /run should reject a body that fails the schema', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/entropy/v1/run', payload: { ...STUDY, window: 1 } });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ ok: false, error: 'VALIDATION_ERROR' });
  });

  it('POST /run should reject an unknown market', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/entropy/v1/run',
      payload: { ...STUDY, markets: ['MARS'] },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ ok: false, error: 'INVALID_CONFIG', message: 'Invalid study config: unknown markets: MARS' });
  });

  it('POST /run should reject a training range that overlaps the testing range', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/entropy/v1/run',
      payload: { ...STUDY, trainingRange: { from: '2022-01-01', to: '2022-07-15' } },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ ok: false, error: 'LOOKAHEAD_VIOLATION' });
  });

  it('GET /runs/:runId should answer 404 for an unknown run', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/entropy/v1/runs/missing-run' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: 'RUN_NOT_FOUND', message: 'Run missing-run not found' });
  });

  it('GET /runs should validate the limit', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/entropy/v1/runs?limit=0' });
    expect(res.statusCode).toBe(400);
  });

  it('unknown routes answer NOT_FOUND', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/nope' });
    expect(res.statusCode).toBe(404);
    expect(res.json().error).toBe('NOT_FOUND');
  });
});
