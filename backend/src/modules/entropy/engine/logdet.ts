/**
 * ENTROPY ENGINE — Sign and log-magnitude of a determinant
 *
 * LU decomposition with partial pivoting. The determinant is never formed:
 * log|det| accumulates log|pivot| and the sign tracks pivot signs and row
 * swaps. A pivot at or below `pivotTolerance` counts as exactly singular.
 */

export interface SignLogDet {
  sign: -1 | 0 | 1;
  logAbsDet: number;
}

export interface LogDetOptions {
  pivotTolerance?: number;
}

export function slogdet(matrix: readonly (readonly number[])[], options: LogDetOptions = {}): SignLogDet {
  const tol = options.pivotTolerance ?? 1e-10;
  const n = matrix.length;
  if (n === 0) return { sign: 1, logAbsDet: 0 };

  const a = matrix.map(row => [...row]);
  let sign: -1 | 1 = 1;
  let logAbsDet = 0;

  for (let k = 0; k < n; k++) {
    let p = k;
    let best = Math.abs(a[k][k]);
    for (let i = k + 1; i < n; i++) {
      const v = Math.abs(a[i][k]);
      if (v > best) {
        best = v;
        p = i;
      }
    }

    if (!(best > tol)) return { sign: 0, logAbsDet: -Infinity };

    if (p !== k) {
      const tmp = a[k];
      a[k] = a[p];
      a[p] = tmp;
      sign = sign === 1 ? -1 : 1;
    }

    const pivot = a[k][k];
    if (pivot < 0) sign = sign === 1 ? -1 : 1;
    logAbsDet += Math.log(Math.abs(pivot));

    for (let i = k + 1; i < n; i++) {
      const f = a[i][k] / pivot;
      if (f === 0) continue;
      const rowI = a[i];
      const rowK = a[k];
      for (let j = k + 1; j < n; j++) rowI[j] -= f * rowK[j];
      rowI[k] = 0;
    }
  }

  return { sign, logAbsDet };
}
