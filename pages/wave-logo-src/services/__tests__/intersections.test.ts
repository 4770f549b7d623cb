import { describe, expect, it } from 'vitest';
import type { CircleSpec, WaveSpec } from '../../types';
import {
  DEFAULT_MAX_SAMPLES,
  findCircleWaveIntersections,
  findIntersections,
  sampleCountFor,
  sineWave
} from '../intersections';
import { SamplingFaultError } from '../errors';
import { positiveAngle } from '../geometry';

const circle: CircleSpec = { center: { x: 0, y: 0 }, radius: 100 };

const wave = (overrides: Partial<WaveSpec> = {}): WaveSpec => ({
  amplitude: 50,
  angularFrequency: (2 * Math.PI) / 200,
  phase: 0,
  baseline: 0,
  shift: 0,
  ...overrides
});

describe('sampleCountFor', () => {
  it('never samples below the floor', () => {
    expect(sampleCountFor(100, Math.PI / 100)).toBe(720);
  });

  it('scales with radius and frequency', () => {
    expect(sampleCountFor(300, (2 * Math.PI) / 10)).toBe(6032);
  });

  it('caps the count for unbounded frequencies', () => {
    expect(sampleCountFor(1, Infinity)).toBe(DEFAULT_MAX_SAMPLES);
  });
});

describe('sineWave', () => {
  it('applies baseline, shift and phase relative to the circle centre', () => {
    const y = sineWave(
      { center: { x: 10, y: 20 }, radius: 5 },
      { amplitude: 2, angularFrequency: 1, phase: Math.PI / 2, baseline: 3, shift: 4 }
    );
    expect(y(14)).toBeCloseTo(25, 12);
  });
});

describe('findCircleWaveIntersections', () => {
  it('finds the two crossings of a one-wavelength wave through the centre', () => {
    const points = findCircleWaveIntersections(circle, wave());
    expect(points).toHaveLength(2);

    const right = points.find((p) => p.x > 0);
    const left = points.find((p) => p.x < 0);
    expect(right?.x).toBeCloseTo(100, 6);
    expect(right?.y).toBeCloseTo(0, 6);
    expect(right?.direction).toBe('exit');
    expect(left?.x).toBeCloseTo(-100, 6);
    expect(left?.y).toBeCloseTo(0, 6);
    expect(left?.direction).toBe('enter');
  });

  it('orders crossings by angle', () => {
    const points = findCircleWaveIntersections(circle, wave({ amplitude: 0, baseline: 60 }));
    expect(points).toHaveLength(2);
    expect(points[0].angle).toBeCloseTo(Math.asin(0.6), 9);
    expect(points[0].x).toBeCloseTo(80, 6);
    expect(points[0].direction).toBe('exit');
    expect(points[1].angle).toBeCloseTo(Math.PI - Math.asin(0.6), 9);
    expect(points[1].x).toBeCloseTo(-80, 6);
    expect(points[1].direction).toBe('enter');
  });

  it('returns no crossings for a flat wave outside the circle', () => {
    expect(findCircleWaveIntersections(circle, wave({ amplitude: 0, baseline: 150 }))).toEqual([]);
    expect(findCircleWaveIntersections(circle, wave({ amplitude: 0, baseline: -150 }))).toEqual([]);
  });

  it('finds an even number of alternating crossings when the wave leaves and re-enters', () => {
    const tall = wave({ amplitude: 150, angularFrequency: Math.PI / 100, phase: Math.PI / 2 });
    const points = findCircleWaveIntersections(circle, tall);
    expect(points).toHaveLength(4);

    const byX = [...points].sort((a, b) => a.x - b.x);
    expect(byX.map((p) => p.direction)).toEqual(['enter', 'exit', 'enter', 'exit']);

    const y = sineWave(circle, tall);
    for (const p of points) {
      expect(Math.hypot(p.x, p.y)).toBeCloseTo(100, 9);
      expect(Math.abs(p.y - y(p.x))).toBeLessThanOrEqual(1e-4);
    }
  });

  it('keeps every crossing inside [0, 2π) and sorted', () => {
    const points = findCircleWaveIntersections(circle, wave({ amplitude: 30, angularFrequency: (2 * Math.PI) / 40 }));
    expect(points.length % 2).toBe(0);
    for (let i = 0; i < points.length; i++) {
      expect(points[i].angle).toBeGreaterThanOrEqual(0);
      expect(points[i].angle).toBeLessThan(2 * Math.PI);
      if (i > 0) expect(points[i].angle).toBeGreaterThanOrEqual(points[i - 1].angle);
    }
  });

  it('keeps the close crossing pairs where tall wave peaks graze the rim', () => {
    const rim: CircleSpec = { center: { x: 0, y: 0 }, radius: 300 };
    const tall = wave({ amplitude: 300, angularFrequency: (2 * Math.PI) / 18, phase: 0.5 + Math.PI / 2 });
    const points = findCircleWaveIntersections(rim, tall);
    const y = sineWave(rim, tall);
    const sideAt = (angle: number) => Math.sign(300 * Math.sin(angle) - y(300 * Math.cos(angle)));

    expect(points.length % 2).toBe(0);
    for (let k = 0; k < points.length; k++) {
      const next = points[(k + 1) % points.length];
      const after = points[(k + 2) % points.length];
      const mid = points[k].angle + positiveAngle(next.angle - points[k].angle) / 2;
      const nextMid = next.angle + positiveAngle(after.angle - next.angle) / 2;
      expect(sideAt(mid)).toBe(-sideAt(nextMid));
    }
  });

  it('is deterministic', () => {
    const spec = wave({ amplitude: 42, angularFrequency: (2 * Math.PI) / 77, phase: 1.3, baseline: -12 });
    expect(findCircleWaveIntersections(circle, spec)).toEqual(findCircleWaveIntersections(circle, spec));
  });
});

describe('findIntersections', () => {
  it('retries an odd count and then raises a SamplingFaultError', () => {
    // One genuine root near t = 1 and a jump at t = 3 that bisection rejects.
    const boundary = (t: number) => ({ x: t, y: t < 3 ? t - 1 : -1 });
    expect(() => findIntersections(boundary, () => 0, { maxSamples: 1440 })).toThrow(SamplingFaultError);
  });

  describe('with spikes narrower than the grid', () => {
    // Two narrow bumps reach over the unit circle at x = 0 and x = cos(π/4).
    const unit = (t: number) => ({ x: Math.cos(t), y: Math.sin(t) });
    const bump = (x: number, at: number) => 2 * Math.exp(-(((x - at) / 1e-5) ** 2));
    const spiky = (x: number) => bump(x, 0) + bump(x, Math.cos(Math.PI / 4));

    it('retries when the arcs between crossings do not alternate sides', () => {
      // 1001 and 2002 samples miss both bumps; 4004 lands on the one at π/2.
      const angles = findIntersections(unit, spiky, { minSamples: 1001 }).map((p) => p.angle);
      expect(angles).toHaveLength(4);
      expect(angles[0]).toBe(0);
      expect(angles[1]).toBeCloseTo(Math.PI / 2, 4);
      expect(angles[2]).toBeCloseTo(Math.PI / 2, 4);
      expect(angles[1]).toBeLessThan(angles[2]);
      expect(angles[3]).toBeCloseTo(Math.PI, 9);
    });

    it('raises a SamplingFaultError once the sample cap is reached', () => {
      expect(() => findIntersections(unit, spiky, { minSamples: 1001, maxSamples: 1001 })).toThrow(
        'do not alternate sides'
      );
    });
  });
});
