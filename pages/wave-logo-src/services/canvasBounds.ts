import type { CanvasBounds, PathSegment, Point, SubPath } from '../types';
import { arcContainsAngle, arcPoint, segmentEnd, segmentStart } from './geometry';

export interface Box {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

const AXIS_ANGLES = [0, Math.PI / 2, Math.PI, (3 * Math.PI) / 2];

const extend = (box: Box | null, p: Point): Box => {
  if (!box) return { minX: p.x, minY: p.y, maxX: p.x, maxY: p.y };
  return {
    minX: Math.min(box.minX, p.x),
    minY: Math.min(box.minY, p.y),
    maxX: Math.max(box.maxX, p.x),
    maxY: Math.max(box.maxY, p.y)
  };
};

const mergeBoxes = (a: Box | null, b: Box | null): Box | null => {
  if (!a) return b;
  if (!b) return a;
  return {
    minX: Math.min(a.minX, b.minX),
    minY: Math.min(a.minY, b.minY),
    maxX: Math.max(a.maxX, b.maxX),
    maxY: Math.max(a.maxY, b.maxY)
  };
};

/** Exact bounds: arc endpoints plus every axis extreme the arc passes through. */
export const segmentBounds = (segment: PathSegment): Box | null => {
  if (segment.kind === 'polyline') {
    return segment.points.reduce<Box | null>(extend, null);
  }
  let box = extend(extend(null, segmentStart(segment)), segmentEnd(segment));
  for (const angle of AXIS_ANGLES) {
    if (arcContainsAngle(segment, angle)) {
      box = extend(box, arcPoint(segment.center, segment.radius, angle));
    }
  }
  return box;
};

export const pathBounds = (paths: SubPath[]): Box | null =>
  paths.reduce<Box | null>(
    (acc, path) => path.segments.reduce<Box | null>((inner, seg) => mergeBoxes(inner, segmentBounds(seg)), acc),
    null
  );

/**
 * Smallest whole-unit rectangle holding every path with half the stroke width
 * and `margin` on each side. Empty input gives a rectangle around the origin.
 */
export const computeCanvasBounds = (paths: SubPath[], strokeWidth: number, margin = 0): CanvasBounds => {
  const box = pathBounds(paths) ?? { minX: 0, minY: 0, maxX: 0, maxY: 0 };
  const pad = Math.max(0, strokeWidth) / 2 + Math.max(0, margin);
  const x = Math.floor(box.minX - pad);
  const y = Math.floor(box.minY - pad);
  const right = Math.ceil(box.maxX + pad);
  const bottom = Math.ceil(box.maxY + pad);
  return { x, y, width: right - x, height: bottom - y };
};

const shift = (p: Point, dx: number, dy: number): Point => ({ x: p.x + dx, y: p.y + dy });

export const translateSubPath = (path: SubPath, dx: number, dy: number): SubPath => ({
  closed: path.closed,
  segments: path.segments.map((seg): PathSegment =>
    seg.kind === 'arc'
      ? { ...seg, center: shift(seg.center, dx, dy) }
      : { kind: 'polyline', points: seg.points.map((p) => shift(p, dx, dy)) }
  )
});

/** Moves geometry so the bounds' top-left corner becomes the origin. */
export const toCanvasOrigin = (bounds: CanvasBounds) => ({ dx: -bounds.x, dy: -bounds.y });

/**
 * True when the path, grown by `inset` on every side, stays inside the bounds.
 */
export const containsPath = (bounds: CanvasBounds, path: SubPath, inset = 0, tolerance = 1e-6): boolean => {
  const box = pathBounds([path]);
  if (!box) return true;
  return (
    box.minX - inset >= bounds.x - tolerance &&
    box.minY - inset >= bounds.y - tolerance &&
    box.maxX + inset <= bounds.x + bounds.width + tolerance &&
    box.maxY + inset <= bounds.y + bounds.height + tolerance
  );
};
