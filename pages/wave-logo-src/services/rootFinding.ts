import { SamplingFaultError } from './errors';

export type ScalarFunction = (t: number) => number;

export interface PeriodicRootOptions {
  samples: number;
  /** Largest |f(root)| accepted after refinement; larger means the bracket held a jump, not a root. */
  maxResidual: number;
  maxIterations?: number;
}

const DEFAULT_MAX_ITERATIONS = 200;

/**
 * Bisection on a bracket with fn(lo) and fn(hi) of opposite sign. Runs until the
 * midpoint stops moving in floating point or the iteration cap is reached.
 */
export const bisect = (
  fn: ScalarFunction,
  lo: number,
  hi: number,
  fLo: number = fn(lo),
  maxIterations: number = DEFAULT_MAX_ITERATIONS
): number => {
  let a = lo;
  let b = hi;
  let fa = fLo;
  for (let i = 0; i < maxIterations; i++) {
    const mid = 0.5 * (a + b);
    if (mid <= a || mid >= b) break;
    const fm = fn(mid);
    if (fm === 0) return mid;
    if (Math.sign(fm) === Math.sign(fa)) {
      a = mid;
      fa = fm;
    } else {
      b = mid;
    }
  }
  return 0.5 * (a + b);
};

/**
 * Golden-section search for a local minimum of `fn` on [lo, hi]. Assumes a
 * single dip inside the bracket.
 */
export const minimizeOnBracket = (
  fn: ScalarFunction,
  lo: number,
  hi: number,
  maxIterations: number = DEFAULT_MAX_ITERATIONS
): number => {
  const ratio = (Math.sqrt(5) - 1) / 2;
  let a = lo;
  let b = hi;
  let c = b - ratio * (b - a);
  let d = a + ratio * (b - a);
  let fc = fn(c);
  let fd = fn(d);
  for (let i = 0; i < maxIterations; i++) {
    if (!(a < c && c < d && d < b)) break;
    if (fc < fd) {
      b = d;
      d = c;
      fd = fc;
      c = b - ratio * (b - a);
      fc = fn(c);
    } else {
      a = c;
      c = d;
      fc = fd;
      d = a + ratio * (b - a);
      fd = fn(d);
    }
  }
  return fc < fd ? c : d;
};

const wrap = (t: number, period: number) => {
  const r = t % period;
  const w = r < 0 ? r + period : r;
  return w >= period ? 0 : w;
};

/**
 * Finds the sign changes of a periodic function over one period [0, period).
 *
 * Samples `options.samples` evenly spaced points and compares each non-zero
 * sample with the next non-zero one, wrapping around the period. Opposite signs
 * on adjacent samples are refined by bisection; opposite signs separated by a
 * run of exact zeros yield the first zero of the run. Zero runs between equal
 * signs are tangential touches and produce nothing.
 *
 * A pair of roots closer together than one sample step leaves no sign change on
 * the grid. Wherever |f| has a local minimum between two samples of its own
 * sign, the dip is searched; if it goes below `-maxResidual` on the far side of
 * zero, both of its roots are refined and kept.
 *
 * Roots are returned sorted ascending.
 */
export const findPeriodicRoots = (fn: ScalarFunction, period: number, options: PeriodicRootOptions): number[] => {
  const samples = Math.max(2, Math.floor(options.samples));
  const step = period / samples;
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  const values = new Array<number>(samples);

  for (let i = 0; i < samples; i++) {
    const v = fn(step * i);
    if (!Number.isFinite(v)) {
      throw new SamplingFaultError(`non-finite sample ${v} at t=${step * i}`);
    }
    values[i] = v;
  }

  const nonZero: number[] = [];
  for (let i = 0; i < samples; i++) {
    if (values[i] !== 0) nonZero.push(i);
  }
  if (nonZero.length < 2) return [];

  const roots: number[] = [];
  for (let k = 0; k < nonZero.length; k++) {
    const i = nonZero[k];
    const j = nonZero[(k + 1) % nonZero.length];
    if (Math.sign(values[i]) === Math.sign(values[j])) continue;

    const gap = (j - i + samples) % samples;
    if (gap > 1) {
      roots.push(wrap(step * ((i + 1) % samples), period));
      continue;
    }

    const lo = step * i;
    const hi = j > i ? step * j : step * j + period;
    const root = bisect(fn, lo, hi, values[i], maxIterations);
    if (Math.abs(fn(root)) > options.maxResidual) continue;
    roots.push(wrap(root, period));
  }

  for (let i = 0; i < samples; i++) {
    const prev = values[(i - 1 + samples) % samples];
    const here = values[i];
    const next = values[(i + 1) % samples];
    if (here === 0 || Math.sign(prev) !== Math.sign(here) || Math.sign(next) !== Math.sign(here)) continue;
    if (!(Math.abs(here) <= Math.abs(prev) && Math.abs(here) < Math.abs(next))) continue;

    const sign = Math.sign(here);
    const lo = step * (i - 1);
    const hi = step * (i + 1);
    const dip = minimizeOnBracket((t) => sign * fn(t), lo, hi, maxIterations);
    const fDip = fn(dip);
    if (sign * fDip >= -options.maxResidual) continue;

    for (const root of [bisect(fn, lo, dip, prev, maxIterations), bisect(fn, dip, hi, fDip, maxIterations)]) {
      if (Math.abs(fn(root)) <= options.maxResidual) roots.push(wrap(root, period));
    }
  }

  return roots.sort((a, b) => a - b);
};
