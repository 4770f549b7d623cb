import type {
  ArcSegment,
  CircleSpec,
  IntersectionPoint,
  PolylineSegment,
  Point,
  RegionPath,
  RegionSide,
  SubPath,
  WaveSpec
} from '../types';
import { SamplingFaultError } from './errors';
import { TAU, arcPoint, positiveAngle } from './geometry';
import { type WaveFunction, arcSideSign, sineWave } from './intersections';

export interface RegionBuildOptions {
  stepsPerWavelength?: number;
  minChordSteps?: number;
  maxChordSteps?: number;
}

export interface RegionPair {
  upper: RegionPath;
  lower: RegionPath;
}

const DEFAULT_STEPS_PER_WAVELENGTH = 64;
const DEFAULT_MIN_CHORD_STEPS = 24;
const DEFAULT_MAX_CHORD_STEPS = 4096;

export const chordSteps = (dx: number, angularFrequency: number, options: RegionBuildOptions = {}) => {
  const perWave = options.stepsPerWavelength ?? DEFAULT_STEPS_PER_WAVELENGTH;
  const min = options.minChordSteps ?? DEFAULT_MIN_CHORD_STEPS;
  const max = options.maxChordSteps ?? DEFAULT_MAX_CHORD_STEPS;
  const wavelengths = (Math.abs(dx) * Math.abs(angularFrequency)) / TAU;
  const wanted = Math.ceil(wavelengths * perWave);
  if (!Number.isFinite(wanted)) return max;
  return Math.max(min, Math.min(max, wanted));
};

/**
 * Samples the wave between two x positions. The given endpoints are kept as-is
 * so the polyline meets whatever it is joined to.
 */
export const sampleWave = (
  wave: WaveFunction,
  from: Point,
  to: Point,
  angularFrequency: number,
  options: RegionBuildOptions = {}
): PolylineSegment => {
  const steps = chordSteps(to.x - from.x, angularFrequency, options);
  const points: Point[] = [{ x: from.x, y: from.y }];
  for (let i = 1; i < steps; i++) {
    const x = from.x + ((to.x - from.x) * i) / steps;
    points.push({ x, y: wave(x) });
  }
  points.push({ x: to.x, y: to.y });
  return { kind: 'polyline', points };
};

export const fullCircleLoop = (circle: CircleSpec): SubPath => ({
  segments: [
    { kind: 'arc', center: { ...circle.center }, radius: circle.radius, startAngle: 0, sweepAngle: Math.PI },
    { kind: 'arc', center: { ...circle.center }, radius: circle.radius, startAngle: Math.PI, sweepAngle: Math.PI }
  ],
  closed: true
});

const arcSide = (circle: CircleSpec, wave: WaveFunction, start: number, sweep: number): RegionSide => {
  const f = (t: number) => {
    const p = arcPoint(circle.center, circle.radius, t);
    return p.y - wave(p.x);
  };
  return arcSideSign(f, start, sweep) < 0 ? 'upper' : 'lower';
};

/**
 * Pairs crossings into the wave pieces that lie inside the disk: sorted by x
 * they must read enter, exit, enter, exit...
 */
export const pairChords = (intersections: IntersectionPoint[]): number[] => {
  const order = intersections.map((_, idx) => idx).sort((a, b) => intersections[a].x - intersections[b].x);
  const partner = new Array<number>(intersections.length);
  for (let k = 0; k < order.length; k += 2) {
    const a = order[k];
    const b = order[k + 1];
    if (intersections[a].direction !== 'enter' || intersections[b].direction !== 'exit') {
      throw new SamplingFaultError(
        `crossings at x=${intersections[a].x.toFixed(3)} and x=${intersections[b].x.toFixed(3)} do not bound a wave piece inside the circle`
      );
    }
    partner[a] = b;
    partner[b] = a;
  }
  return partner;
};

/**
 * Splits the disk along the wave into the part above it (`upper`, smaller y)
 * and the part below (`lower`).
 *
 * Circle arcs between consecutive crossings alternate sides. Each region loop
 * follows one of its arcs forward in angle, then the wave piece from the arc's
 * end to the other end of that piece, then the next arc of the same side, until
 * it returns to the arc it started from.
 */
export const buildRegions = (
  circle: CircleSpec,
  wave: WaveSpec,
  intersections: IntersectionPoint[],
  options: RegionBuildOptions = {}
): RegionPair => {
  const waveY = sineWave(circle, wave);
  const n = intersections.length;

  if (n === 0) {
    const centerSide: RegionSide = circle.center.y - waveY(circle.center.x) > 0 ? 'lower' : 'upper';
    return {
      upper: { side: 'upper', loops: centerSide === 'upper' ? [fullCircleLoop(circle)] : [] },
      lower: { side: 'lower', loops: centerSide === 'lower' ? [fullCircleLoop(circle)] : [] }
    };
  }
  if (n % 2 !== 0) {
    throw new SamplingFaultError(`cannot split the circle along ${n} crossings`);
  }

  const arcs = intersections.map((from, k) => {
    const to = intersections[(k + 1) % n];
    const sweep = positiveAngle(to.angle - from.angle);
    const segment: ArcSegment = {
      kind: 'arc',
      center: { ...circle.center },
      radius: circle.radius,
      startAngle: from.angle,
      sweepAngle: sweep
    };
    return { segment, side: arcSide(circle, waveY, from.angle, sweep) };
  });

  for (let k = 0; k < n; k++) {
    if (arcs[k].side === arcs[(k + 1) % n].side) {
      throw new SamplingFaultError(`arcs ${k} and ${(k + 1) % n} fall on the same side of the wave`);
    }
  }

  const partner = pairChords(intersections);

  const walk = (side: RegionSide): RegionPath => {
    const visited = new Set<number>();
    const loops: SubPath[] = [];

    for (let start = 0; start < n; start++) {
      if (arcs[start].side !== side || visited.has(start)) continue;

      const segments: SubPath['segments'] = [];
      let current = start;
      do {
        visited.add(current);
        segments.push(arcs[current].segment);
        const end = (current + 1) % n;
        const next = partner[end];
        segments.push(sampleWave(waveY, intersections[end], intersections[next], wave.angularFrequency, options));
        if (arcs[next].side !== side) {
          throw new SamplingFaultError(`wave piece from crossing ${end} leads to an arc on the other side`);
        }
        if (next !== start && visited.has(next)) {
          throw new SamplingFaultError(`region loop from arc ${start} does not close`);
        }
        current = next;
      } while (current !== start);

      loops.push({ segments, closed: true });
    }

    return { side, loops };
  };

  return { upper: walk('upper'), lower: walk('lower') };
};
