/**
 * Numerical helpers for read-support distributions
 *
 * Quantiles, Gaussian kernel density estimation with a rule-of-thumb
 * bandwidth, and Brent's one-dimensional minimizer. Everything here is pure
 * and deterministic: the same input always produces the same output.
 */

/**
 * Sample quantile using linear interpolation between order statistics
 *
 * For sorted values x[0..n-1] and probability p, returns
 * x[j] + g * (x[j+1] - x[j]) with h = (n - 1) * p, j = floor(h), g = h - j.
 * Returns `NaN` for an empty sample.
 *
 * @example
 * ```typescript
 * quantile([1, 2, 3, 4, 5], 0.8); // 4.2
 * ```
 */
export function quantile(values: readonly number[], p: number): number {
  if (p < 0 || p > 1 || Number.isNaN(p)) {
    throw new Error(`Quantile probability must be within [0, 1], got ${p}`);
  }
  if (values.length === 0) return Number.NaN;

  const sorted = [...values].sort((a, b) => a - b);
  return quantileSorted(sorted, p);
}

function quantileSorted(sorted: readonly number[], p: number): number {
  const h = (sorted.length - 1) * p;
  const j = Math.floor(h);
  const lower = sorted[j];
  if (lower === undefined) return Number.NaN;
  const upper = sorted[j + 1];
  if (upper === undefined) return lower;
  return lower + (h - j) * (upper - lower);
}

/**
 * Arithmetic mean; `NaN` for an empty sample
 */
function mean(values: readonly number[]): number {
  if (values.length === 0) return Number.NaN;
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

/**
 * Sample standard deviation (n - 1 denominator); `NaN` below two values
 */
export function standardDeviation(values: readonly number[]): number {
  if (values.length < 2) return Number.NaN;
  const m = mean(values);
  let squares = 0;
  for (const value of values) squares += (value - m) ** 2;
  return Math.sqrt(squares / (values.length - 1));
}

/**
 * Silverman's rule-of-thumb bandwidth for a Gaussian kernel
 *
 * 0.9 * min(sd, IQR / 1.34) * n^(-1/5), falling back to the sd, then to the
 * magnitude of the first value, then to 1 when the spread is zero.
 */
export function silvermanBandwidth(values: readonly number[]): number {
  if (values.length < 2) {
    throw new Error("Bandwidth estimation requires at least two values");
  }

  const sorted = [...values].sort((a, b) => a - b);
  const sd = standardDeviation(sorted);
  const iqr = quantileSorted(sorted, 0.75) - quantileSorted(sorted, 0.25);

  let lo = Math.min(sd, iqr / 1.34);
  if (!(lo > 0)) {
    const first = Math.abs(values[0] ?? 0);
    lo = sd > 0 ? sd : first > 0 ? first : 1;
  }
  return 0.9 * lo * values.length ** -0.2;
}

const INV_SQRT_2PI = 1 / Math.sqrt(2 * Math.PI);

/**
 * Gaussian kernel density estimate
 *
 * @param values - Sample to smooth
 * @param bandwidth - Kernel standard deviation (defaults to Silverman's rule)
 * @returns Density function evaluated exactly at any point
 */
export function gaussianKde(
  values: readonly number[],
  bandwidth: number = silvermanBandwidth(values)
): (x: number) => number {
  if (values.length === 0) {
    throw new Error("Kernel density estimation requires at least one value");
  }
  if (!(bandwidth > 0)) {
    throw new Error(`Bandwidth must be positive, got ${bandwidth}`);
  }

  const sample = [...values];
  const norm = INV_SQRT_2PI / (sample.length * bandwidth);

  return (x: number): number => {
    let sum = 0;
    for (const value of sample) {
      const z = (x - value) / bandwidth;
      sum += Math.exp(-0.5 * z * z);
    }
    return sum * norm;
  };
}

/**
 * Evaluate a density on an evenly spaced grid
 */
export function densityGrid(
  density: (x: number) => number,
  from: number,
  to: number,
  points = 512
): Array<{ x: number; y: number }> {
  if (points < 2) throw new Error("Density grid needs at least two points");
  const step = (to - from) / (points - 1);
  const grid: Array<{ x: number; y: number }> = [];
  for (let i = 0; i < points; i++) {
    const x = from + i * step;
    grid.push({ x, y: density(x) });
  }
  return grid;
}

/**
 * Default convergence tolerance for {@link brentMinimize}: eps^(1/4)
 */
export const DEFAULT_MINIMIZE_TOLERANCE = Number.EPSILON ** 0.25;

const GOLDEN_SECTION = (3 - Math.sqrt(5)) * 0.5;

/**
 * Brent's method for a local minimum of a function on [lower, upper]
 *
 * Combines golden-section search with successive parabolic interpolation.
 * Deterministic, and never evaluates outside the interval.
 *
 * @returns Abscissa of the minimum found
 */
export function brentMinimize(
  f: (x: number) => number,
  lower: number,
  upper: number,
  tolerance = DEFAULT_MINIMIZE_TOLERANCE
): number {
  if (!(lower < upper)) {
    throw new Error(`Invalid search interval [${lower}, ${upper}]`);
  }

  const eps = Math.sqrt(Number.EPSILON);
  const tol3 = tolerance / 3;
  let a = lower;
  let b = upper;
  let v = a + GOLDEN_SECTION * (b - a);
  let w = v;
  let x = v;
  let d = 0;
  let e = 0;
  let fx = f(x);
  let fv = fx;
  let fw = fx;

  for (;;) {
    const xm = (a + b) * 0.5;
    const tol1 = eps * Math.abs(x) + tol3;
    const t2 = tol1 * 2;

    if (Math.abs(x - xm) <= t2 - (b - a) * 0.5) break;

    let p = 0;
    let q = 0;
    let r = 0;
    if (Math.abs(e) > tol1) {
      // fit parabola through x, v, w
      r = (x - w) * (fx - fv);
      q = (x - v) * (fx - fw);
      p = (x - v) * q - (x - w) * r;
      q = (q - r) * 2;
      if (q > 0) p = -p;
      else q = -q;
      r = e;
      e = d;
    }

    if (Math.abs(p) >= Math.abs(q * 0.5 * r) || p <= q * (a - x) || p >= q * (b - x)) {
      e = x < xm ? b - x : a - x;
      d = GOLDEN_SECTION * e;
    } else {
      d = p / q;
      const u = x + d;
      if (u - a < t2 || b - u < t2) {
        d = x < xm ? tol1 : -tol1;
      }
    }

    const u = Math.abs(d) >= tol1 ? x + d : d > 0 ? x + tol1 : x - tol1;
    const fu = f(u);

    if (fu <= fx) {
      if (u < x) b = x;
      else a = x;
      v = w;
      fv = fw;
      w = x;
      fw = fx;
      x = u;
      fx = fu;
    } else {
      if (u < x) a = u;
      else b = u;
      if (fu <= fw || w === x) {
        v = w;
        fv = fw;
        w = u;
        fw = fu;
      } else if (fu <= fv || v === x || v === w) {
        v = u;
        fv = fu;
      }
    }
  }

  return x;
}
