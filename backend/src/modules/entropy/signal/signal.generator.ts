/**
 * ENTROPY MODULE — Signal Generator
 *
 * enter   ⇔ value is valid and strictly above the trained threshold
 * neutral ⇔ otherwise (gaps and ties included)
 *
 * Each date is decided on its own value only, so the output does not depend
 * on the order points arrive in.
 */

import type { EvaluationSlice, Signal, SignalDirection, TrainedThreshold } from '../entropy.types.js';
import { LookaheadViolationError } from '../entropy.errors.js';

export function generateSignals(evaluation: EvaluationSlice, threshold: TrainedThreshold): Signal[] {
  const kind: string = evaluation.kind;
  if (kind !== 'evaluation') {
    throw new LookaheadViolationError('Signals can only be generated on an evaluation slice', { kind });
  }
  if (threshold.trainedOn.to >= evaluation.range.from) {
    throw new LookaheadViolationError(
      `Threshold trained through ${threshold.trainedOn.to} cannot score evaluation from ${evaluation.range.from}`,
      { trainedOn: threshold.trainedOn, evaluation: evaluation.range }
    );
  }

  return evaluation.points
    .map((p): Signal => ({
      date: p.date,
      direction: p.value !== null && p.value > threshold.value ? 'enter' : 'neutral',
      value: p.value,
    }))
    .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

/**
 * enter only where both series enter on the same date. The value carried is
 * the primary series'.
 */
export function combineSignals(primary: readonly Signal[], secondary: readonly Signal[]): Signal[] {
  const other = new Map(secondary.map((s): [string, SignalDirection] => [s.date, s.direction]));
  return primary
    .filter(s => other.has(s.date))
    .map((s): Signal => ({
      date: s.date,
      direction: s.direction === 'enter' && other.get(s.date) === 'enter' ? 'enter' : 'neutral',
      value: s.value,
    }));
}

export function countEntries(signals: readonly Signal[]): number {
  return signals.filter(s => s.direction === 'enter').length;
}
