/**
 * ENTROPY ENGINE — Rolling Entanglement Entropy
 *
 * For each return row t >= W-1, the W rows ending at t give a Pearson
 * correlation matrix C over the N instruments and
 *
 *   S(t) = -log det(C) / N
 *
 * det(C) only enters through slogdet. A non-positive determinant sign
 * (near-duplicate series) or an undefined correlation (flat series) marks
 * the date invalid. Gaps stay gaps.
 *
 *   C → identity        ⇒ S → 0
 *   correlations → 1    ⇒ S → +∞
 */

import type { EntropyPoint, EntropySeries, ReturnMatrix } from '../entropy.types.js';
import { DegenerateCorrelationError } from '../entropy.errors.js';
import { pearsonCorrelation, type CorrelationMatrix } from './correlation.js';
import { slogdet } from './logdet.js';

export interface EntropyOptions {
  /** added to the diagonal before the decomposition */
  ridge?: number;
  pivotTolerance?: number;
}

export interface RollingEntropyOptions extends EntropyOptions {
  window: number;
}

/**
 * Entropy of one correlation matrix. Throws DegenerateCorrelationError
 * when the matrix is not positive definite.
 */
export function entropyFromCorrelation(corr: CorrelationMatrix, options: EntropyOptions = {}): number {
  const n = corr.length;
  const ridge = options.ridge ?? 0;
  const m = ridge > 0 ? corr.map((row, i) => row.map((v, j) => (i === j ? v + ridge : v))) : corr;

  const { sign, logAbsDet } = slogdet(m, { pivotTolerance: options.pivotTolerance });
  if (sign <= 0) throw new DegenerateCorrelationError(sign, n);

  return 0 - logAbsDet / n;
}

/**
 * Entropy point for the window ending at row t (inclusive).
 */
export function entropyAt(matrix: ReturnMatrix, t: number, options: RollingEntropyOptions): EntropyPoint {
  const date = matrix.dates[t];
  const corr = pearsonCorrelation(matrix.rows, t - options.window + 1, t + 1);
  if (!corr.ok) return { date, valid: false, value: null, reason: corr.reason };

  try {
    return { date, valid: true, value: entropyFromCorrelation(corr.matrix, options) };
  } catch (err) {
    if (err instanceof DegenerateCorrelationError) {
      return { date, valid: false, value: null, reason: 'DEGENERATE_CORRELATION' };
    }
    throw err;
  }
}

export function computeRollingEntropy(
  matrix: ReturnMatrix,
  options: RollingEntropyOptions,
  market: string = ''
): EntropySeries {
  const points: EntropyPoint[] = [];
  for (let t = options.window - 1; t < matrix.rows.length; t++) {
    points.push(entropyAt(matrix, t, options));
  }
  return { market, window: options.window, tickers: [...matrix.tickers], points };
}

export function summarizeEntropy(series: EntropySeries) {
  const values = series.points.flatMap(p => (p.valid ? [p.value] : []));
  const sum = values.reduce((s, x) => s + x, 0);
  return {
    points: series.points.length,
    validPoints: values.length,
    invalidPoints: series.points.length - values.length,
    min: values.length ? Math.min(...values) : null,
    max: values.length ? Math.max(...values) : null,
    mean: values.length ? sum / values.length : null,
  };
}
