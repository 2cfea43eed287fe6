/**
 * MongoDB connection (mongoose)
 */

import mongoose from 'mongoose';

let connected = false;

export async function connectMongo(url: string, dbName?: string): Promise<void> {
  if (connected) return;
  await mongoose.connect(url, { dbName, autoIndex: false });
  connected = true;
  console.log(`[DB] Connected to MongoDB${dbName ? ` (${dbName})` : ''}`);
}

export async function disconnectMongo(): Promise<void> {
  if (!connected) return;
  await mongoose.disconnect();
  connected = false;
  console.log('[DB] Disconnected from MongoDB');
}

export { mongoose };
