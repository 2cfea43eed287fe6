/**
 * Statistics helpers: percentiles, moments, exact binomial tail and
 * Student-t tail via the regularized incomplete beta (Lanczos log-gamma
 * + continued fraction).
 */

export function mean(values: readonly number[]): number {
  return values.reduce((s, x) => s + x, 0) / Math.max(1, values.length);
}

/** Sample standard deviation (n - 1). 0 for fewer than two values. */
export function stdDev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  const ss = values.reduce((s, x) => s + (x - m) * (x - m), 0);
  return Math.sqrt(ss / (values.length - 1));
}

/**
 * Percentile with linear interpolation between order statistics, p in [0, 100].
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0;

  const sorted = [...values].sort((a, b) => a - b);
  const index = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(index);
  const upper = Math.ceil(index);

  if (lower === upper) return sorted[lower];

  const fraction = index - lower;
  return sorted[lower] * (1 - fraction) + sorted[upper] * fraction;
}

/** Pearson correlation of two equally long samples; null if undefined. */
export function correlation(x: readonly number[], y: readonly number[]): number | null {
  const n = Math.min(x.length, y.length);
  if (n < 2) return null;
  const mx = mean(x.slice(0, n));
  const my = mean(y.slice(0, n));
  let sxy = 0, sxx = 0, syy = 0;
  for (let i = 0; i < n; i++) {
    const dx = x[i] - mx;
    const dy = y[i] - my;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }
  if (sxx === 0 || syy === 0) return null;
  return sxy / Math.sqrt(sxx * syy);
}

// ═══════════════════════════════════════════════════════════════
// TAIL PROBABILITIES
// ═══════════════════════════════════════════════════════════════

/**
 * ln Γ(z), Lanczos (g = 7). Binomial coefficients are formed from it in log
 * space so n in the thousands does not overflow.
 */
export function logGamma(z: number): number {
  const p = [
    676.5203681218851, -1259.1392167224028, 771.32342877765313,
    -176.61502916214059, 12.507343278686905, -0.13857109526572012,
    9.9843695780195716e-6, 1.5056327351493116e-7
  ];
  if (z < 0.5) {
    return Math.log(Math.PI) - Math.log(Math.sin(Math.PI * z)) - logGamma(1 - z);
  }
  z -= 1;
  let x = 0.99999999999980993;
  for (let i = 0; i < p.length; i++) {
    x += p[i] / (z + i + 1);
  }
  const t = z + p.length - 0.5;
  return 0.5 * Math.log(2 * Math.PI) + (z + 0.5) * Math.log(t) - t + Math.log(x);
}

const CF_MAX_ITERATIONS = 300;
const CF_EPS = 3e-14;
const CF_FLOOR = 1e-300;

/**
 * Lentz continued fraction for I_x(a, b). The iteration cap covers
 * a = df / 2 for the trade counts a backtest produces.
 */
function betaContinuedFraction(a: number, b: number, x: number): number {

  const qab = a + b;
  const qap = a + 1;
  const qam = a - 1;
  let c = 1;
  let d = 1 - qab * x / qap;
  if (Math.abs(d) < CF_FLOOR) d = CF_FLOOR;
  d = 1 / d;
  let h = d;

  for (let m = 1; m <= CF_MAX_ITERATIONS; m++) {
    const m2 = 2 * m;
    let aa = m * (b - m) * x / ((qam + m2) * (a + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < CF_FLOOR) d = CF_FLOOR;
    c = 1 + aa / c;
    if (Math.abs(c) < CF_FLOOR) c = CF_FLOOR;
    d = 1 / d;
    h *= d * c;

    aa = -(a + m) * (qab + m) * x / ((a + m2) * (qap + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < CF_FLOOR) d = CF_FLOOR;
    c = 1 + aa / c;
    if (Math.abs(c) < CF_FLOOR) c = CF_FLOOR;
    d = 1 / d;
    const del = d * c;
    h *= del;

    if (Math.abs(del - 1) < CF_EPS) break;
  }

  return h;
}

/**
 * Regularized incomplete beta I_x(a, b), evaluated on whichever side of
 * the mean converges faster.
 */
export function regIncompleteBeta(x: number, a: number, b: number): number {
  if (x <= 0) return 0;
  if (x >= 1) return 1;

  const lb = logGamma(a + b) - logGamma(a) - logGamma(b)
    + a * Math.log(x) + b * Math.log(1 - x);

  const bt = Math.exp(lb);

  if (x < (a + 1) / (a + b + 2)) {
    return bt * betaContinuedFraction(a, b, x) / a;
  } else {
    return 1 - bt * betaContinuedFraction(b, a, 1 - x) / b;
  }
}

/**
 * P(X >= k) for X ~ Binomial(n, p), summed in log space.
 */
export function binomialUpperTail(k: number, n: number, p: number = 0.5): number {
  if (k <= 0) return 1;
  if (k > n) return 0;
  const lnFactN = logGamma(n + 1);
  const lp = Math.log(p);
  const lq = Math.log(1 - p);
  let total = 0;
  for (let i = k; i <= n; i++) {
    const lnChoose = lnFactN - logGamma(i + 1) - logGamma(n - i + 1);
    total += Math.exp(lnChoose + i * lp + (n - i) * lq);
  }
  return Math.min(1, total);
}

/**
 * P(T > t) for Student's t with df degrees of freedom:
 * P(|T| > |t|) = I_{df / (df + t²)}(df / 2, 1 / 2), halved for one side.
 * Used for the one-sided test on mean trade return.
 */
export function studentTUpperTail(t: number, df: number): number {
  const x = df / (df + t * t);
  const tail = 0.5 * regIncompleteBeta(x, df / 2, 0.5);
  return t > 0 ? tail : 1 - tail;
}
