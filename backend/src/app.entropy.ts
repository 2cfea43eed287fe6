/**
 * MARKET ENTROPY — Server Entrypoint
 *
 * Run: npx tsx backend/src/app.entropy.ts
 */

import 'dotenv/config';
import { env } from './config/env.js';
import { buildApp } from './app.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import { ensureIndexes } from './db/indexes.js';
import { createEntropyDeps } from './modules/entropy/entropy.bootstrap.js';

async function main() {
  const useMongo = env.MONGO_URL !== '';
  if (useMongo) {
    await connectMongo(env.MONGO_URL, env.DB_NAME);
    await ensureIndexes();
  } else {
    console.log('[Entropy] MONGO_URL not set, runs are kept in memory');
  }

  const deps = createEntropyDeps(env, console, { mongo: useMongo });
  const app = buildApp(deps);

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`[Entropy] Received ${signal}, shutting down...`);
    await app.close();
    await disconnectMongo();
    console.log('[Entropy] Shutdown complete');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await app.listen({ port: env.PORT, host: env.HOST });
  console.log('═══════════════════════════════════════════════════════════════');
  console.log(`  ✅ Market Entropy backend started on port ${env.PORT} (source: ${deps.provider.name})`);
  console.log('═══════════════════════════════════════════════════════════════');
  console.log('');
  console.log('📦 Available Endpoints:');
  console.log('  GET  /api/health');
  console.log('  GET  /api/entropy/v1/info');
  console.log('  POST /api/entropy/v1/run');
  console.log('  GET  /api/entropy/v1/runs');
  console.log('  GET  /api/entropy/v1/runs/:runId');
  console.log('');
}

main().catch((err) => {
  console.error('[Entropy] Fatal error:', err);
  process.exit(1);
});
