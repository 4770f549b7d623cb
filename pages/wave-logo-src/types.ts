export interface Point {
  x: number;
  y: number;
}

export interface CircleSpec {
  center: Point;
  radius: number;
}

/**
 * y = center.y + baseline + amplitude * sin(angularFrequency * (x - center.x - shift) + phase)
 */
export interface WaveSpec {
  amplitude: number;
  angularFrequency: number;
  phase: number;
  baseline: number;
  shift: number;
}

export type CrossingDirection = 'enter' | 'exit';

export interface IntersectionPoint extends Point {
  angle: number;
  direction: CrossingDirection;
}

export interface ArcSegment {
  kind: 'arc';
  center: Point;
  radius: number;
  startAngle: number;
  // positive = increasing angle (clockwise on screen)
  sweepAngle: number;
}

export interface PolylineSegment {
  kind: 'polyline';
  points: Point[];
}

export type PathSegment = ArcSegment | PolylineSegment;

export interface SubPath {
  segments: PathSegment[];
  closed: boolean;
}

export type RegionSide = 'upper' | 'lower';

export interface RegionPath {
  side: RegionSide;
  loops: SubPath[];
}

export interface CanvasBounds {
  x: number;
  y: number;
  width: number;
  height: number;
}

export type PathCommand =
  | { type: 'M'; x: number; y: number }
  | { type: 'L'; x: number; y: number }
  | { type: 'A'; rx: number; ry: number; largeArc: boolean; sweep: boolean; x: number; y: number }
  | { type: 'Z' };

/** Presentation only. `'none'` is allowed for the background and the stroke. */
export interface StyleSpec {
  upperFill: string;
  lowerFill: string;
  background: string;
  strokeColor: string;
  strokeWidth: number;
}

export type LogoVariant = 'split' | 'helix';

export interface LogoParams {
  variant: LogoVariant;
  diameter: number;
  wavelengthFrac: number;
  amplitudeFrac: number;
  phase: number;
  baselineFrac: number;
  lineWidth: number;
  waveProjection: number;
  waveAdj1: number;
  waveAdj2: number;
  marginFrac: number;
  fg1: string;
  fg2: string;
  bg: string;
  strokeColor: string;
}

export type NumericParamKey = {
  [K in keyof LogoParams]: LogoParams[K] extends number ? K : never;
}[keyof LogoParams];

export type ColorParamKey = 'fg1' | 'fg2' | 'bg' | 'strokeColor';

export interface DrawnShape {
  paths: SubPath[];
  fill: string;
  stroke: string;
  strokeWidth: number;
  lineCap: 'butt' | 'round';
}

export interface LogoScene {
  bounds: CanvasBounds;
  background: string;
  shapes: DrawnShape[];
  intersections: IntersectionPoint[];
}
