import type { TrainedThreshold, TrainingSlice } from '../entropy.types.js';
import { InsufficientHistoryError, LookaheadViolationError } from '../entropy.errors.js';
import { percentile } from '../utils/statistics.js';

/**
 * Fixed percentile threshold over the valid values of a training slice.
 */
export function fitThreshold(training: TrainingSlice, pct: number): TrainedThreshold {
  const kind: string = training.kind;
  if (kind !== 'training') {
    throw new LookaheadViolationError('Thresholds can only be fitted on a training slice', { kind });
  }

  const values = training.points.flatMap(p => (p.value === null ? [] : [p.value]));
  if (values.length === 0) {
    throw new InsufficientHistoryError(
      `No valid indicator values in training range ${training.range.from}..${training.range.to}`,
      { trainingRange: training.range }
    );
  }

  return {
    value: percentile(values, pct),
    percentile: pct,
    trainedOn: { ...training.range },
    sampleSize: values.length,
  };
}
