/**
 * ENTROPY ENGINE TESTS
 *
 * 1. Return matrix: strict intersection, coverage exclusion, history checks
 * 2. Pearson correlation and log-determinant
 * 3. Entropy of a correlation matrix (identity, equicorrelation, singular)
 * 4. Rolling entropy on synthetic returns, incl. a correlation spike
 */

import { describe, it, expect } from 'vitest';
import type { PriceSeries, ReturnMatrix } from '../entropy.types.js';
import { DegenerateCorrelationError, InsufficientHistoryError } from '../entropy.errors.js';
import { computeReturnMatrix } from '../engine/returns.calculator.js';
import { equicorrelation, pearsonCorrelation } from '../engine/correlation.js';
import { slogdet } from '../engine/logdet.js';
import {
  computeRollingEntropy,
  entropyFromCorrelation,
  summarizeEntropy,
} from '../engine/entropy.engine.js';
import { mulberry32, randn } from '../utils/random.js';

function series(ticker: string, entries: [string, number][]): PriceSeries {
  return {
    market: 'test',
    ticker,
    points: entries.map(([date, adjustedClose]) => ({ date, ticker, adjustedClose })),
  };
}

function dayLabel(i: number): string {
  return `d${String(i).padStart(4, '0')}`;
}

function matrixFromRows(rows: number[][]): ReturnMatrix {
  const cols = rows[0].length;
  return {
    dates: rows.map((_, i) => dayLabel(i)),
    tickers: Array.from({ length: cols }, (_, j) => `T${j}`),
    rows,
    excluded: [],
  };
}

function gaussianRows(days: number, cols: number, sd: number, seed: number): number[][] {
  const rng = mulberry32(seed);
  return Array.from({ length: days }, () => Array.from({ length: cols }, () => sd * randn(rng)));
}

function equicorrelationEntropy(n: number, rho: number): number {
  return -((n - 1) * Math.log(1 - rho) + Math.log(1 + (n - 1) * rho)) / n;
}

describe('Return Calculator', () => {
  const A = series('A', [
    ['2024-01-01', 100], ['2024-01-02', 110], ['2024-01-03', 121], ['2024-01-04', 133.1], ['2024-01-05', 146.41],
  ]);
  const B = series('B', [
    ['2024-01-01', 50], ['2024-01-02', 45], ['2024-01-03', 50], ['2024-01-04', 55], ['2024-01-05', 50],
  ]);
  const C = series('C', [
    ['2024-01-01', 10], ['2024-01-02', 20], ['2024-01-04', 40], ['2024-01-05', 20],
  ]);

  it('should inner-join on dates present in every series', () => {
    const m = computeReturnMatrix(new Map([['A', A], ['B', B], ['C', C]]), { window: 2 });

    expect(m.tickers).toEqual(['A', 'B', 'C']);
    expect(m.dates).toEqual(['2024-01-02', '2024-01-04', '2024-01-05']);
    expect(m.rows[0][0]).toBeCloseTo(Math.log(1.1), 12);
    // 01-02 → 01-04 spans the date C is missing
    expect(m.rows[1][0]).toBeCloseTo(Math.log(133.1 / 110), 12);
    expect(m.rows[1][2]).toBeCloseTo(Math.log(2), 12);
    expect(m.rows[2][1]).toBeCloseTo(Math.log(50 / 55), 12);
    expect(m.excluded).toEqual([]);
  });

  it('should exclude instruments below the coverage threshold instead of filling', () => {
    const m = computeReturnMatrix(new Map([['A', A], ['B', B], ['C', C]]), { window: 2, minCoverage: 0.9 });

    expect(m.tickers).toEqual(['A', 'B']);
    expect(m.dates).toHaveLength(4);
    expect(m.excluded).toEqual([{ ticker: 'C', reason: 'INCOMPLETE_HISTORY', detail: '4/5 dates' }]);
  });

  it('should decide coverage on the coverage range and join away later gaps', () => {
    // C misses 01-03 only; coverage is counted over 01-04..01-05, where C is complete
    const m = computeReturnMatrix(new Map([['A', A], ['B', B], ['C', C]]), {
      window: 2,
      minCoverage: 0.9,
      coverageRange: { from: '2024-01-04', to: '2024-01-05' },
    });
    expect(m.tickers).toEqual(['A', 'B', 'C']);
    expect(m.dates).toEqual(['2024-01-02', '2024-01-04', '2024-01-05']);
    expect(m.excluded).toEqual([]);

    const early = computeReturnMatrix(new Map([['A', A], ['B', B], ['C', C]]), {
      window: 2,
      minCoverage: 0.9,
      coverageRange: { from: '2024-01-01', to: '2024-01-03' },
    });
    expect(early.tickers).toEqual(['A', 'B']);
    expect(early.excluded).toEqual([{ ticker: 'C', reason: 'INCOMPLETE_HISTORY', detail: '2/3 dates' }]);
  });

  it('should restrict to the configured range', () => {
    const m = computeReturnMatrix(new Map([['A', A], ['B', B]]), {
      window: 1,
      range: { from: '2024-01-03', to: '2024-01-05' },
    });
    expect(m.dates).toEqual(['2024-01-04', '2024-01-05']);
    expect(m.rows[0][0]).toBeCloseTo(Math.log(1.1), 12);
  });

  it('should throw InsufficientHistory with fewer than window + 1 common dates', () => {
    expect(() => computeReturnMatrix(new Map([['A', A], ['C', C]]), { window: 4 }))
      .toThrow(InsufficientHistoryError);
    expect(() => computeReturnMatrix(new Map([['A', A], ['C', C]]), { window: 3 })).not.toThrow();
  });

  it('should throw InsufficientHistory when too few instruments remain', () => {
    expect(() =>
      computeReturnMatrix(new Map([['A', A], ['C', C]]), { window: 2, minCoverage: 0.9 })
    ).toThrow(/Only 1 instruments/);
  });
});

describe('Pearson correlation', () => {
  it('should give a symmetric unit-diagonal matrix within [-1, 1]', () => {
    const rows = [[1, 2, -1], [2, 4, -2], [4, 8, -4], [3, 6, -3]];
    const res = pearsonCorrelation(rows);
    if (!res.ok) throw new Error('expected a correlation matrix');

    expect(res.matrix[0][0]).toBe(1);
    expect(res.matrix[1][1]).toBe(1);
    expect(res.matrix[0][1]).toBeCloseTo(1, 12);
    expect(res.matrix[0][2]).toBeCloseTo(-1, 12);
    expect(res.matrix[2][0]).toBe(res.matrix[0][2]);
    for (const row of res.matrix) {
      for (const v of row) {
        expect(v).toBeGreaterThanOrEqual(-1);
        expect(v).toBeLessThanOrEqual(1);
      }
    }
  });

  it('should use only rows [start, end)', () => {
    const rows = [[100, -100], [1, 1], [2, 2], [3, 3]];
    const res = pearsonCorrelation(rows, 1, 4);
    if (!res.ok) throw new Error('expected a correlation matrix');
    expect(res.matrix[0][1]).toBeCloseTo(1, 12);
  });

  it('should report a flat column instead of dividing by zero', () => {
    const res = pearsonCorrelation([[1, 5], [2, 5], [3, 5]]);
    expect(res).toEqual({ ok: false, reason: 'ZERO_VARIANCE', column: 1 });
  });
});

describe('slogdet', () => {
  it('should return sign and log-magnitude of a diagonal matrix', () => {
    const r = slogdet([[2, 0], [0, 3]]);
    expect(r.sign).toBe(1);
    expect(r.logAbsDet).toBeCloseTo(Math.log(6), 12);
  });

  it('should track the sign through row swaps', () => {
    const r = slogdet([[0, 1], [1, 0]]);
    expect(r.sign).toBe(-1);
    expect(r.logAbsDet).toBeCloseTo(0, 12);
  });

  it('should match a known 3x3 determinant', () => {
    const r = slogdet([[4, 3, 0], [3, 4, 0], [0, 0, 2]]);
    expect(r.sign).toBe(1);
    expect(r.logAbsDet).toBeCloseTo(Math.log(14), 12);
  });

  it('should report sign 0 for a singular matrix', () => {
    expect(slogdet([[1, 2], [2, 4]])).toEqual({ sign: 0, logAbsDet: -Infinity });
  });

  it('should stay finite where the plain determinant underflows', () => {
    const n = 400;
    const m = Array.from({ length: n }, (_, i) =>
      Array.from({ length: n }, (_, j) => (i === j ? 1e-3 : 0))
    );
    const r = slogdet(m);
    expect(r.sign).toBe(1);
    expect(r.logAbsDet).toBeCloseTo(n * Math.log(1e-3), 6);
  });

  it('should treat the empty matrix as determinant 1', () => {
    expect(slogdet([])).toEqual({ sign: 1, logAbsDet: 0 });
  });
});

describe('entropyFromCorrelation', () => {
  it('should be exactly 0 for the identity', () => {
    expect(entropyFromCorrelation(equicorrelation(5, 0))).toBe(0);
  });

  it('should match the closed form for an equicorrelation matrix', () => {
    expect(entropyFromCorrelation(equicorrelation(10, 0.5))).toBeCloseTo(equicorrelationEntropy(10, 0.5), 10);
    expect(entropyFromCorrelation(equicorrelation(40, 0.9))).toBeCloseTo(equicorrelationEntropy(40, 0.9), 8);
  });

  it('should be non-decreasing as pairwise correlation rises toward 1', () => {
    const rhos = [0, 0.05, 0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7, 0.8, 0.9, 0.95, 0.99, 0.999];
    const values = rhos.map(rho => entropyFromCorrelation(equicorrelation(20, rho)));
    for (let i = 1; i < values.length; i++) {
      expect(values[i]).toBeGreaterThanOrEqual(values[i - 1]);
    }
    expect(values[values.length - 1]).toBeGreaterThan(5);
  });

  it('should throw DegenerateCorrelationError for perfect correlation', () => {
    expect(() => entropyFromCorrelation(equicorrelation(4, 1))).toThrow(DegenerateCorrelationError);
  });

  it('should turn a singular matrix into a finite value with a ridge', () => {
    const s = entropyFromCorrelation(equicorrelation(4, 1), { ridge: 0.01 });
    expect(Number.isFinite(s)).toBe(true);
  });
});

describe('computeRollingEntropy', () => {
  it('should start at the first full window and end each window at its own date', () => {
    const m = matrixFromRows(gaussianRows(30, 3, 0.01, 1));
    const s = computeRollingEntropy(m, { window: 10 }, 'X');

    expect(s.market).toBe('X');
    expect(s.points).toHaveLength(21);
    expect(s.points[0].date).toBe(dayLabel(9));
    expect(s.points[20].date).toBe(dayLabel(29));
  });

  it('should stay near zero for independent instruments', () => {
    const m = matrixFromRows(gaussianRows(600, 5, 0.01, 11));
    const s = computeRollingEntropy(m, { window: 250 });
    const summary = summarizeEntropy(s);

    expect(summary.invalidPoints).toBe(0);
    expect(summary.max).not.toBeNull();
    expect(summary.max ?? Infinity).toBeLessThan(0.04);
    expect(summary.min ?? -Infinity).toBeGreaterThanOrEqual(0);
  });

  it('should mark identical series invalid instead of returning zero or infinity', () => {
    const rng = mulberry32(3);
    const rows = Array.from({ length: 40 }, () => {
      const r = 0.01 * randn(rng);
      return [r, r, r, r];
    });
    const s = computeRollingEntropy(matrixFromRows(rows), { window: 20 });

    expect(s.points).toHaveLength(21);
    for (const p of s.points) {
      expect(p.valid).toBe(false);
      expect(p.value).toBeNull();
      if (!p.valid) expect(p.reason).toBe('DEGENERATE_CORRELATION');
    }
  });

  it('should gap-mark windows with a flat instrument and keep the rest', () => {
    const rows = gaussianRows(40, 3, 0.01, 5);
    for (let i = 0; i < 15; i++) rows[i][2] = 0;
    const s = computeRollingEntropy(matrixFromRows(rows), { window: 10 });

    // windows ending at rows 9..14 only see the flat stretch
    for (let t = 9; t <= 14; t++) {
      const p = s.points[t - 9];
      expect(p).toEqual({ date: dayLabel(t), valid: false, value: null, reason: 'ZERO_VARIANCE' });
    }
    expect(s.points[6].valid).toBe(true);
    expect(summarizeEntropy(s).invalidPoints).toBe(6);
  });

  it('should peak inside a 30-day correlation spike and return to baseline outside it', () => {
    const N = 50;
    const W = 60;
    const rng = mulberry32(2024);
    const rows: number[][] = [];
    for (let day = 0; day < 500; day++) {
      if (day >= 300 && day < 330) {
        const f = randn(rng);
        rows.push(Array.from({ length: N }, () => 0.03 * f + 0.001 * randn(rng)));
      } else {
        rows.push(Array.from({ length: N }, () => 0.01 * randn(rng)));
      }
    }

    const s = computeRollingEntropy(matrixFromRows(rows), { window: W });
    const byEnd = new Map<number, number>();
    s.points.forEach((p, i) => {
      if (p.valid) byEnd.set(i + W - 1, p.value);
    });
    expect(byEnd.size).toBe(500 - W + 1);

    let peakAt = -1;
    let peak = -Infinity;
    let baselineMax = -Infinity;
    for (const [t, v] of byEnd) {
      if (v > peak) {
        peak = v;
        peakAt = t;
      }
      // window [t-W+1, t] disjoint from rows 300..329
      if (t < 300 || t - W + 1 > 329) baselineMax = Math.max(baselineMax, v);
    }

    expect(peakAt).toBeGreaterThanOrEqual(300);
    expect(peakAt).toBeLessThan(330 + W - 1);
    expect(byEnd.get(345) ?? 0).toBeGreaterThan(1.5);
    expect(baselineMax).toBeLessThan(1.2);
    expect(peak).toBeGreaterThan(baselineMax + 0.5);
  });

  it('should peak where every instrument moves identically and never gap-mark', () => {
    const N = 20;
    const W = 60;
    const rng = mulberry32(77);
    const rows: number[][] = [];
    for (let day = 0; day < 500; day++) {
      if (day >= 300 && day < 330) {
        const r = 0.03 * randn(rng);
        rows.push(Array.from({ length: N }, () => r));
      } else {
        rows.push(Array.from({ length: N }, () => 0.01 * randn(rng)));
      }
    }

    const s = computeRollingEntropy(matrixFromRows(rows), { window: W });
    expect(s.points).toHaveLength(500 - W + 1);
    expect(summarizeEntropy(s).invalidPoints).toBe(0);

    let peakAt = -1;
    let peak = -Infinity;
    let baselineMax = -Infinity;
    s.points.forEach((p, i) => {
      if (!p.valid) return;
      const t = i + W - 1;
      if (p.value > peak) {
        peak = p.value;
        peakAt = t;
      }
      if (t < 300 || t - W + 1 > 329) baselineMax = Math.max(baselineMax, p.value);
    });

    // windows ending on 300..388 contain spike rows
    expect(peakAt).toBeGreaterThanOrEqual(300);
    expect(peakAt).toBeLessThan(330 + W - 1);
    expect(baselineMax).toBeLessThan(0.5);
    expect(peak).toBeGreaterThan(1);
  });
});
