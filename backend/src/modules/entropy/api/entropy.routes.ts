/**
 * ENTROPY ROUTES — Study runs and stored results
 *
 * Errors are thrown as EntropyError and answered by the app error handler.
 */

import type { FastifyInstance } from 'fastify';
import { ENTROPY_DEFAULTS, TRADE_MODES } from '../entropy.config.js';
import type { EntropyStudyService, StudyRequest } from '../entropy.service.js';

const dateRangeSchema = {
  type: 'object',
  required: ['from', 'to'],
  additionalProperties: false,
  properties: {
    from: { type: 'string', pattern: '^\\d{4}-\\d{2}-\\d{2}$' },
    to: { type: 'string', pattern: '^\\d{4}-\\d{2}-\\d{2}$' },
  },
} as const;

const runBodySchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    markets: { type: 'array', items: { type: 'string' }, minItems: 1 },
    volatility: { type: 'boolean' },
    window: { type: 'integer', minimum: 2 },
    thresholdPercentile: { type: 'number', minimum: 0, maximum: 100 },
    holdingPeriod: { type: 'integer', minimum: 1 },
    trainingRange: dateRangeSchema,
    testingRange: dateRangeSchema,
    universeSize: { type: 'integer', minimum: 2 },
    tradeModes: { type: 'array', items: { type: 'string', enum: [...TRADE_MODES] }, minItems: 1 },
    weeklyCheckDay: { type: 'integer', minimum: 0, maximum: 6 },
    minCoverage: { type: 'number', exclusiveMinimum: 0, maximum: 1 },
    minInstruments: { type: 'integer', minimum: 2 },
    ridge: { type: 'number', minimum: 0 },
    sensitivityPercentiles: { type: 'array', items: { type: 'number', minimum: 0, maximum: 100 } },
    crashThreshold: { type: 'number', exclusiveMaximum: 0 },
    changeLag: { type: 'integer', minimum: 1 },
    changePercentile: { type: 'number', minimum: 0, maximum: 100 },
    correlationHorizons: { type: 'array', items: { type: 'integer', minimum: 1 } },
  },
} as const;

// ═══════════════════════════════════════════════════════════════
// REGISTER ROUTES
// ═══════════════════════════════════════════════════════════════

export async function registerEntropyRoutes(fastify: FastifyInstance, service: EntropyStudyService) {
  const prefix = '/api/entropy/v1';

  /**
   * GET /api/entropy/v1/info
   *
   * Defaults and the market catalog
   */
  fastify.get(`${prefix}/info`, async () => {
    const { catalog } = service;
    return {
      ok: true,
      defaults: ENTROPY_DEFAULTS,
      tradeModes: TRADE_MODES,
      volatility: catalog.volatility,
      markets: catalog.markets.map(m => ({
        key: m.key,
        name: m.name,
        benchmark: m.benchmark,
        instruments: m.tickers.length,
      })),
    };
  });

  /**
   * POST /api/entropy/v1/run
   *
   * Run a study and store it
   */
  fastify.post<{ Body: StudyRequest }>(
    `${prefix}/run`,
    { schema: { body: runBodySchema } },
    async (req) => {
      const report = await service.run(req.body ?? {});
      fastify.log.info(`[Entropy] run ${report.runId} stored (${report.markets.length} markets)`);
      return { ok: true, report };
    }
  );

  /**
   * GET /api/entropy/v1/runs?limit=20
   */
  fastify.get<{ Querystring: { limit?: number } }>(
    `${prefix}/runs`,
    {
      schema: {
        querystring: {
          type: 'object',
          properties: { limit: { type: 'integer', minimum: 1, maximum: 200 } },
        },
      },
    },
    async (req) => {
      const runs = await service.listRuns(req.query.limit ?? 20);
      return { ok: true, count: runs.length, runs };
    }
  );

  /**
   * GET /api/entropy/v1/runs/:runId
   */
  fastify.get<{ Params: { runId: string } }>(`${prefix}/runs/:runId`, async (req) => {
    const run = await service.getRun(req.params.runId);
    return { ok: true, ...run };
  });
}
