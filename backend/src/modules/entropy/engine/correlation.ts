/**
 * ENTROPY ENGINE — Pearson correlation over a window of return rows.
 */

export type CorrelationMatrix = number[][];

export type CorrelationResult =
  | { ok: true; matrix: CorrelationMatrix }
  | { ok: false; reason: 'ZERO_VARIANCE'; column: number };

/**
 * Correlation of the columns of rows[start..end) (end exclusive).
 * Symmetric, unit diagonal, clamped to [-1, 1].
 */
export function pearsonCorrelation(
  rows: readonly (readonly number[])[],
  start: number = 0,
  end: number = rows.length
): CorrelationResult {
  const n = end - start;
  const cols = n > 0 ? rows[start].length : 0;

  const means = new Array<number>(cols).fill(0);
  for (let i = start; i < end; i++) {
    for (let j = 0; j < cols; j++) means[j] += rows[i][j];
  }
  for (let j = 0; j < cols; j++) means[j] /= n;

  // centered window, column-major
  const centered: number[][] = [];
  for (let j = 0; j < cols; j++) {
    const col = new Array<number>(n);
    for (let i = 0; i < n; i++) col[i] = rows[start + i][j] - means[j];
    centered.push(col);
  }

  const cov: number[][] = [];
  for (let a = 0; a < cols; a++) {
    cov.push(new Array<number>(cols).fill(0));
  }
  for (let a = 0; a < cols; a++) {
    const x = centered[a];
    for (let b = a; b < cols; b++) {
      const y = centered[b];
      let s = 0;
      for (let i = 0; i < n; i++) s += x[i] * y[i];
      cov[a][b] = s;
      cov[b][a] = s;
    }
  }

  for (let j = 0; j < cols; j++) {
    if (!(cov[j][j] > 0)) return { ok: false, reason: 'ZERO_VARIANCE', column: j };
  }

  const matrix: CorrelationMatrix = [];
  for (let a = 0; a < cols; a++) {
    const row = new Array<number>(cols);
    for (let b = 0; b < cols; b++) {
      if (a === b) {
        row[b] = 1;
        continue;
      }
      const r = cov[a][b] / Math.sqrt(cov[a][a] * cov[b][b]);
      row[b] = Math.max(-1, Math.min(1, r));
    }
    matrix.push(row);
  }

  return { ok: true, matrix };
}

/**
 * Equicorrelation matrix: unit diagonal, rho elsewhere.
 */
export function equicorrelation(size: number, rho: number): CorrelationMatrix {
  const m: CorrelationMatrix = [];
  for (let i = 0; i < size; i++) {
    const row = new Array<number>(size).fill(rho);
    row[i] = 1;
    m.push(row);
  }
  return m;
}
