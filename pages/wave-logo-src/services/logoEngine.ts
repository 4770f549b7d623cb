import type { ArcSegment, CircleSpec, DrawnShape, IntersectionPoint, LogoParams, LogoScene, Point } from '../types';
import { computeCanvasBounds, toCanvasOrigin, translateSubPath } from './canvasBounds';
import { flattenSubPath, polygonArea, positiveAngle } from './geometry';
import { type IntersectionOptions, findCircleWaveIntersections, sineWave } from './intersections';
import { NO_COLOR } from './colors';
import { circleSpecFromParams, styleFromParams, validateParams, waveSpecFromParams } from './params';
import { type RegionBuildOptions, buildRegions, sampleWave } from './regionBuilder';
import { renderSvg } from './svgDocument';

export interface ComposeOptions {
  intersections?: Omit<IntersectionOptions, 'scale' | 'angularFrequency'>;
  regions?: RegionBuildOptions;
}

interface RawScene {
  shapes: DrawnShape[];
  intersections: IntersectionPoint[];
}

const composeSplit = (params: LogoParams, circle: CircleSpec, options: ComposeOptions): RawScene => {
  const wave = waveSpecFromParams(params);
  const intersections = findCircleWaveIntersections(circle, wave, options.intersections);
  const { upper, lower } = buildRegions(circle, wave, intersections, options.regions);
  const style = styleFromParams(params);

  const shapes: DrawnShape[] = [];
  for (const [region, fill] of [
    [upper, style.upperFill],
    [lower, style.lowerFill]
  ] as const) {
    if (region.loops.length === 0) continue;
    shapes.push({ paths: region.loops, fill, stroke: style.strokeColor, strokeWidth: style.strokeWidth, lineCap: 'round' });
  }
  return { shapes, intersections };
};

const rimArc = (circle: CircleSpec, from: number, to: number): ArcSegment => ({
  kind: 'arc',
  center: { ...circle.center },
  radius: circle.radius,
  startAngle: from,
  sweepAngle: -positiveAngle(from - to)
});

/**
 * Arc from `from` to `to`, decreasing in angle, on the circle through both
 * points whose centre lies closest to `near`.
 */
const arcBetween = (near: Point, from: Point, to: Point): ArcSegment => {
  const mid = { x: (from.x + to.x) / 2, y: (from.y + to.y) / 2 };
  const len = Math.hypot(to.x - from.x, to.y - from.y);
  const nx = -(to.y - from.y) / len;
  const ny = (to.x - from.x) / len;
  const offset = (near.x - mid.x) * nx + (near.y - mid.y) * ny;
  const center = { x: mid.x + offset * nx, y: mid.y + offset * ny };
  const startAngle = Math.atan2(from.y - center.y, from.x - center.x);
  const endAngle = Math.atan2(to.y - center.y, to.x - center.x);
  return {
    kind: 'arc',
    center,
    radius: Math.hypot(from.x - center.x, from.y - center.y),
    startAngle,
    sweepAngle: -positiveAngle(startAngle - endAngle)
  };
};

/**
 * Two stroked waves, the second half a turn out of phase. Each gets the circle
 * arc between its outermost crossings on its own side: the first wave the top,
 * the second the bottom. With a wave projection the waves run past the rim and
 * the arcs bend out to meet their projected ends.
 */
const composeHelix = (params: LogoParams, circle: CircleSpec, options: ComposeOptions): RawScene => {
  const arcs: DrawnShape[] = [];
  const waves: DrawnShape[] = [];
  const intersections: IntersectionPoint[] = [];
  const project = (x: number) => circle.center.x + (x - circle.center.x) * (1 + params.waveProjection);

  for (const index of [0, 1] as const) {
    const wave = waveSpecFromParams(params, index);
    const waveY = sineWave(circle, wave);
    const crossings = findCircleWaveIntersections(circle, wave, options.intersections);
    intersections.push(...crossings);
    if (crossings.length < 2) continue;

    const byX = [...crossings].sort((a, b) => a.x - b.x);
    const left = byX[0];
    const right = byX[byX.length - 1];
    const color = index === 0 ? params.fg2 : params.fg1;

    const endpoint = (p: IntersectionPoint): Point => {
      if (params.waveProjection === 0) return { x: p.x, y: p.y };
      const x = project(p.x);
      return { x, y: waveY(x) };
    };
    const leftEnd = endpoint(left);
    const rightEnd = endpoint(right);

    // Decreasing angle runs through the top from the right end, through the bottom from the left end.
    const arc =
      params.waveProjection === 0
        ? rimArc(circle, index === 0 ? right.angle : left.angle, index === 0 ? left.angle : right.angle)
        : arcBetween(circle.center, index === 0 ? rightEnd : leftEnd, index === 0 ? leftEnd : rightEnd);
    arcs.push({
      paths: [{ segments: [arc], closed: false }],
      fill: NO_COLOR,
      stroke: color,
      strokeWidth: params.lineWidth,
      lineCap: 'butt'
    });

    waves.push({
      paths: [
        {
          segments: [sampleWave(waveY, leftEnd, rightEnd, wave.angularFrequency, options.regions)],
          closed: false
        }
      ],
      fill: NO_COLOR,
      stroke: color,
      strokeWidth: params.lineWidth,
      lineCap: 'round'
    });
  }

  return { shapes: [...arcs, ...waves], intersections };
};

/**
 * Validates the parameters, builds the geometry for the chosen variant and
 * moves it onto a canvas sized to hold every stroke plus the margin.
 */
export const composeLogo = (input: LogoParams, options: ComposeOptions = {}): LogoScene => {
  const params = validateParams(input);
  const circle = circleSpecFromParams(params);
  const raw = params.variant === 'helix' ? composeHelix(params, circle, options) : composeSplit(params, circle, options);

  const strokeWidth = raw.shapes.reduce((max, s) => (s.stroke === NO_COLOR ? max : Math.max(max, s.strokeWidth)), 0);
  const bounds = computeCanvasBounds(
    raw.shapes.flatMap((s) => s.paths),
    strokeWidth,
    params.marginFrac * params.diameter
  );
  const { dx, dy } = toCanvasOrigin(bounds);

  return {
    bounds: { x: 0, y: 0, width: bounds.width, height: bounds.height },
    background: params.bg,
    shapes: raw.shapes.map((shape) => ({ ...shape, paths: shape.paths.map((p) => translateSubPath(p, dx, dy)) })),
    intersections: raw.intersections.map((p) => ({ ...p, x: p.x + dx, y: p.y + dy }))
  };
};

/** Area enclosed by a filled shape. Its loops never overlap, so their areas add. */
export const shapeArea = (shape: DrawnShape) =>
  shape.paths.reduce((sum, path) => sum + Math.abs(polygonArea(flattenSubPath(path))), 0);

export const generateLogoSvg = (params: LogoParams, options: ComposeOptions = {}) =>
  renderSvg(composeLogo(params, options));
