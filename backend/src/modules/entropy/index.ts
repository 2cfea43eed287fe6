/**
 * ENTROPY MODULE INDEX — Main Entry Point
 */

import type { FastifyInstance } from 'fastify';
import { registerEntropyRoutes } from './api/entropy.routes.js';
import { EntropyStudyService, type EntropyServiceDeps } from './entropy.service.js';

export { EntropyStudyService } from './entropy.service.js';
export type { EntropyServiceDeps, StudyRequest } from './entropy.service.js';

export async function registerEntropyModule(
  fastify: FastifyInstance,
  deps: EntropyServiceDeps
): Promise<EntropyStudyService> {
  console.log('[Entropy] Registering Entropy Module');
  const service = new EntropyStudyService(deps);
  await registerEntropyRoutes(fastify, service);
  console.log('[Entropy] ✅ Registered at /api/entropy/v1/*');
  return service;
}
