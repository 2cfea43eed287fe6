/**
 * ENTROPY RUN MONGO MODEL
 */

import mongoose, { Schema, type Model } from 'mongoose';
import type { StudyConfig } from '../entropy.config.js';
import type { CrossMarketReport } from '../entropy.types.js';

export interface EntropyRunDoc {
  runId: string;
  generatedAt: Date;
  source: string;
  markets: string[];
  failedMarkets: string[];
  durationMs: number;
  config: StudyConfig;
  report: CrossMarketReport;
}

const EntropyRunSchema = new Schema<EntropyRunDoc>(
  {
    runId: { type: String, required: true, unique: true },
    generatedAt: { type: Date, required: true },
    source: { type: String, required: true },
    markets: [{ type: String }],
    failedMarkets: [{ type: String }],
    durationMs: { type: Number, default: 0 },
    config: { type: Schema.Types.Mixed, required: true },
    report: { type: Schema.Types.Mixed, required: true },
  },
  { timestamps: { createdAt: 'createdAt', updatedAt: false }, collection: 'entropy_runs' }
);

EntropyRunSchema.index({ generatedAt: -1 });

export function entropyRunModel(): Model<EntropyRunDoc> {
  return mongoose.models.EntropyRun
    ? mongoose.model<EntropyRunDoc>('EntropyRun')
    : mongoose.model<EntropyRunDoc>('EntropyRun', EntropyRunSchema);
}
