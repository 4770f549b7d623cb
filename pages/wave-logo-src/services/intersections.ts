import type { CircleSpec, CrossingDirection, IntersectionPoint, Point, WaveSpec } from '../types';
import { SamplingFaultError } from './errors';
import { TAU, arcPoint, positiveAngle } from './geometry';
import { type ScalarFunction, findPeriodicRoots } from './rootFinding';

/** A closed curve parameterised over [0, 2π). */
export type BoundaryCurve = (t: number) => Point;

/** The dividing curve, y as a function of x. */
export type WaveFunction = (x: number) => number;

export interface IntersectionOptions {
  samplesPerHalfWave?: number;
  minSamples?: number;
  maxSamples?: number;
  /** Typical curve size, used for residual and derivative scales. Defaults to 1. */
  scale?: number;
  /** Angular frequency of the wave; drives the sample count. */
  angularFrequency?: number;
  maxResidual?: number;
}

export const DEFAULT_SAMPLES_PER_HALF_WAVE = 16;
export const DEFAULT_MIN_SAMPLES = 720;
export const DEFAULT_MAX_SAMPLES = 1 << 20;

export const circleBoundary = (circle: CircleSpec): BoundaryCurve => (t) =>
  arcPoint(circle.center, circle.radius, t);

export const sineWave = (circle: CircleSpec, wave: WaveSpec): WaveFunction => (x) =>
  circle.center.y +
  wave.baseline +
  wave.amplitude * Math.sin(wave.angularFrequency * (x - circle.center.x - wave.shift) + wave.phase);

/**
 * Samples needed so each half wavelength gets `samplesPerHalfWave` samples where
 * the boundary moves fastest in x (one half wave spans π / (R·ω) radians there).
 */
export const sampleCountFor = (
  radius: number,
  angularFrequency: number,
  samplesPerHalfWave = DEFAULT_SAMPLES_PER_HALF_WAVE,
  minSamples = DEFAULT_MIN_SAMPLES,
  maxSamples = DEFAULT_MAX_SAMPLES
) => {
  const wanted = Math.ceil(samplesPerHalfWave * 2 * radius * Math.abs(angularFrequency));
  if (!Number.isFinite(wanted)) return maxSamples;
  return Math.max(minSamples, Math.min(maxSamples, wanted));
};

/**
 * Which side of zero `f` sits on along the arc from `start` over `sweep`, by a
 * vote of three points so a touch at one of them cannot decide it. Ties count
 * as negative.
 */
export const arcSideSign = (f: ScalarFunction, start: number, sweep: number): 1 | -1 =>
  Math.sign(f(start + sweep * 0.25)) + Math.sign(f(start + sweep * 0.5)) + Math.sign(f(start + sweep * 0.75)) > 0
    ? 1
    : -1;

/** True when the arcs between consecutive roots lie on alternate sides of zero. */
const sidesAlternate = (f: ScalarFunction, angles: number[]) => {
  const n = angles.length;
  let previous: number | null = null;
  for (let k = 0; k <= n; k++) {
    const start = angles[k % n];
    const sweep = positiveAngle(angles[(k + 1) % n] - start) || TAU;
    const side = arcSideSign(f, start, sweep);
    if (previous === side) return false;
    previous = side;
  }
  return true;
};

/**
 * Boundaries run counter-clockwise in (x, y), so the interior lies to the left
 * of the tangent. The wave enters when its +x direction points to that side.
 */
const crossingDirection = (
  angle: number,
  point: Point,
  boundary: BoundaryCurve,
  wave: WaveFunction,
  scale: number
): CrossingDirection => {
  const dt = 1e-6;
  const before = boundary(angle - dt);
  const after = boundary(angle + dt);
  const tx = after.x - before.x;
  const ty = after.y - before.y;

  const dx = 1e-6 * scale;
  const slope = (wave(point.x + dx) - wave(point.x - dx)) / (2 * dx);

  return -ty + slope * tx > 0 ? 'enter' : 'exit';
};

/**
 * Finds every point where `wave` crosses the closed `boundary`, ordered by
 * boundary angle from 0. Tangential touches are not crossings.
 *
 * The zero set of f(t) = boundary(t).y - wave(boundary(t).x) is bracketed on a
 * fixed grid and refined by bisection. An odd count, or boundary arcs that do
 * not alternate sides of the wave, means crossings were missed: the search is
 * retried at twice the resolution until `maxSamples`, then a
 * SamplingFaultError is thrown.
 */
export const findIntersections = (
  boundary: BoundaryCurve,
  wave: WaveFunction,
  options: IntersectionOptions = {}
): IntersectionPoint[] => {
  const scale = options.scale ?? 1;
  const maxSamples = options.maxSamples ?? DEFAULT_MAX_SAMPLES;
  const maxResidual = options.maxResidual ?? 1e-6 * scale;
  const f = (t: number) => {
    const p = boundary(t);
    return p.y - wave(p.x);
  };

  let samples = sampleCountFor(
    scale,
    options.angularFrequency ?? 0,
    options.samplesPerHalfWave,
    options.minSamples,
    maxSamples
  );

  const fault = (angles: number[]) => {
    if (angles.length % 2 !== 0) {
      return `found ${angles.length} crossings at ${samples} samples; an even count is required`;
    }
    if (angles.length > 0 && !sidesAlternate(f, angles)) {
      return `found ${angles.length} crossings at ${samples} samples but the arcs between them do not alternate sides`;
    }
    return null;
  };

  let angles = findPeriodicRoots(f, TAU, { samples, maxResidual });
  let problem = fault(angles);
  while (problem !== null) {
    if (samples >= maxSamples) throw new SamplingFaultError(problem);
    samples = Math.min(maxSamples, samples * 2);
    angles = findPeriodicRoots(f, TAU, { samples, maxResidual });
    problem = fault(angles);
  }

  return angles.map((angle) => {
    const p = boundary(angle);
    return { x: p.x, y: p.y, angle, direction: crossingDirection(angle, p, boundary, wave, scale) };
  });
};

export const findCircleWaveIntersections = (
  circle: CircleSpec,
  wave: WaveSpec,
  options: Omit<IntersectionOptions, 'scale' | 'angularFrequency'> = {}
): IntersectionPoint[] =>
  findIntersections(circleBoundary(circle), sineWave(circle, wave), {
    ...options,
    scale: circle.radius,
    angularFrequency: wave.angularFrequency
  });
