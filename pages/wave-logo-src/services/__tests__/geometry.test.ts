import { describe, expect, it } from 'vitest';
import type { ArcSegment, SubPath } from '../../types';
import {
  TAU,
  arcContainsAngle,
  flattenSubPath,
  polygonArea,
  positiveAngle,
  segmentEnd
} from '../geometry';

const arc = (startAngle: number, sweepAngle: number): ArcSegment => ({
  kind: 'arc',
  center: { x: 0, y: 0 },
  radius: 10,
  startAngle,
  sweepAngle
});

describe('geometry', () => {
  it('wraps angles into [0, 2π)', () => {
    expect(positiveAngle(-Math.PI / 2)).toBeCloseTo((3 * Math.PI) / 2, 12);
    expect(positiveAngle(TAU)).toBe(0);
    expect(positiveAngle(3 * Math.PI)).toBeCloseTo(Math.PI, 12);
  });

  it('checks angles against arcs in both directions', () => {
    expect(arcContainsAngle(arc(-Math.PI / 4, Math.PI / 2), 0)).toBe(true);
    expect(arcContainsAngle(arc(-Math.PI / 4, Math.PI / 2), Math.PI)).toBe(false);
    expect(arcContainsAngle(arc(Math.PI / 4, -Math.PI / 2), 0)).toBe(true);
    expect(arcContainsAngle(arc(Math.PI / 4, -Math.PI / 2), Math.PI / 2)).toBe(false);
  });

  it('finds arc end points', () => {
    const end = segmentEnd(arc(0, Math.PI / 2));
    expect(end.x).toBeCloseTo(0, 12);
    expect(end.y).toBeCloseTo(10, 12);
  });

  it('flattens arcs without repeating shared points', () => {
    const loop: SubPath = { segments: [arc(0, Math.PI), arc(Math.PI, Math.PI)], closed: true };
    const points = flattenSubPath(loop, 8);
    expect(points).toHaveLength(9);
    expect(polygonArea(points)).toBeCloseTo(200 * Math.SQRT2, 9);
  });

  it('measures polygon area', () => {
    const square = [
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 10, y: 10 },
      { x: 0, y: 10 }
    ];
    expect(polygonArea(square)).toBe(100);
    expect(polygonArea([...square].reverse())).toBe(-100);
  });
});
