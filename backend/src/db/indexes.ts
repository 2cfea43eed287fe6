/**
 * Database Indexes
 * Run on startup, after connectMongo
 */

import { mongoose } from './mongoose.js';
import { errorMessage } from '../modules/entropy/entropy.errors.js';

export async function ensureIndexes(): Promise<void> {
  const db = mongoose.connection.db;
  if (!db) {
    console.log('[DB] No database connection, skipping indexes');
    return;
  }

  try {
    const runs = db.collection('entropy_runs');
    await runs.createIndex({ runId: 1 }, { unique: true });
    await runs.createIndex({ generatedAt: -1 });
    console.log('[DB] entropy_runs indexes created');
  } catch (err) {
    console.log('[DB] entropy_runs indexes already exist or error:', errorMessage(err));
  }

  console.log('[DB] Indexes ensured');
}
