import type { ArcSegment, PathSegment, Point, SubPath } from '../types';

export const TAU = Math.PI * 2;

/** Wraps an angle into [0, 2π). */
export const positiveAngle = (angle: number) => {
  const wrapped = angle % TAU;
  const result = wrapped < 0 ? wrapped + TAU : wrapped;
  return result >= TAU ? 0 : result;
};

export const arcPoint = (center: Point, radius: number, angle: number): Point => ({
  x: center.x + radius * Math.cos(angle),
  y: center.y + radius * Math.sin(angle)
});

export const arcEndAngle = (arc: ArcSegment) => arc.startAngle + arc.sweepAngle;

export const segmentStart = (segment: PathSegment): Point =>
  segment.kind === 'arc' ? arcPoint(segment.center, segment.radius, segment.startAngle) : segment.points[0];

export const segmentEnd = (segment: PathSegment): Point =>
  segment.kind === 'arc'
    ? arcPoint(segment.center, segment.radius, arcEndAngle(segment))
    : segment.points[segment.points.length - 1];

/** True when `angle` lies on the arc, endpoints included. */
export const arcContainsAngle = (arc: ArcSegment, angle: number) => {
  const offset =
    arc.sweepAngle >= 0 ? positiveAngle(angle - arc.startAngle) : positiveAngle(arc.startAngle - angle);
  return offset <= Math.abs(arc.sweepAngle);
};

const flattenArc = (arc: ArcSegment, stepsPerTurn: number): Point[] => {
  const steps = Math.max(2, Math.ceil((Math.abs(arc.sweepAngle) / TAU) * stepsPerTurn));
  const points: Point[] = [];
  for (let i = 0; i <= steps; i++) {
    points.push(arcPoint(arc.center, arc.radius, arc.startAngle + (arc.sweepAngle * i) / steps));
  }
  return points;
};

/**
 * Approximates a subpath by a polyline. Arcs are split into `stepsPerTurn`
 * chords per full revolution; shared segment endpoints are emitted once.
 */
export const flattenSubPath = (path: SubPath, stepsPerTurn = 720): Point[] => {
  const out: Point[] = [];
  for (const segment of path.segments) {
    const pts = segment.kind === 'arc' ? flattenArc(segment, stepsPerTurn) : segment.points;
    const startIdx = out.length > 0 ? 1 : 0;
    for (let i = startIdx; i < pts.length; i++) out.push(pts[i]);
  }
  return out;
};

/**
 * Signed shoelace area (positive = clockwise on screen, y down).
 */
export const polygonArea = (polygon: Point[]): number => {
  if (polygon.length < 3) return 0;
  let area = 0;
  for (let i = 0; i < polygon.length; i++) {
    const j = (i + 1) % polygon.length;
    area += polygon[i].x * polygon[j].y;
    area -= polygon[j].x * polygon[i].y;
  }
  return area / 2;
};
