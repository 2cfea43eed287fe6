import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env } from './config/env.js';
import { EntropyError } from './modules/entropy/entropy.errors.js';
import { registerEntropyModule } from './modules/entropy/index.js';
import type { EntropyServiceDeps } from './modules/entropy/entropy.service.js';

export interface BuildAppOptions {
  /** pino level; false disables request logging (tests) */
  logLevel?: string | false;
}

/**
 * Build Fastify Application
 */
export function buildApp(deps: EntropyServiceDeps, options: BuildAppOptions = {}): FastifyInstance {
  const level = options.logLevel ?? env.LOG_LEVEL;
  const app = Fastify({
    logger: level === false ? false : { level },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof EntropyError) {
      app.log.warn(`[Entropy] ${err.code}: ${err.message}`);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    app.log.error(err);

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    // Unknown errors
    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/api/health', async () => ({
    ok: true,
    service: 'market-entropy',
    source: deps.provider.name,
    storage: deps.repository.name,
    timestamp: new Date().toISOString(),
  }));

  app.register(async (fastify) => {
    await registerEntropyModule(fastify, { ...deps, logger: deps.logger ?? fastify.log });
  });

  return app;
}
