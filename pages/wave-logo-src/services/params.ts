import type { CircleSpec, ColorParamKey, LogoParams, LogoVariant, NumericParamKey, StyleSpec, WaveSpec } from '../types';
import { NO_COLOR, isValidColor } from './colors';
import { InvalidParameterError } from './errors';
import { TAU } from './geometry';

export interface ParamRange {
  min: number;
  max: number;
  step: number;
}

export const DEFAULT_PARAMS: Readonly<LogoParams> = Object.freeze({
  variant: 'split',
  diameter: 600,
  wavelengthFrac: 0.7,
  amplitudeFrac: 0.12,
  phase: 0,
  baselineFrac: 0,
  lineWidth: 40,
  waveProjection: 0,
  waveAdj1: 0,
  waveAdj2: 0,
  marginFrac: 0.05,
  fg1: '#63C5DA',
  fg2: '#C4EF87',
  bg: '#27374D',
  strokeColor: '#27374D'
});

export const PARAM_RANGES: Record<NumericParamKey, ParamRange> = {
  diameter: { min: 100, max: 1200, step: 10 },
  wavelengthFrac: { min: 0.01, max: 1, step: 0.01 },
  amplitudeFrac: { min: 0, max: 1, step: 0.01 },
  phase: { min: 0, max: Number(TAU.toFixed(2)), step: 0.01 },
  baselineFrac: { min: -1, max: 1, step: 0.01 },
  lineWidth: { min: 0, max: 200, step: 2 },
  waveProjection: { min: -0.5, max: 0.5, step: 0.01 },
  waveAdj1: { min: -0.2, max: 0.2, step: 0.01 },
  waveAdj2: { min: -0.2, max: 0.2, step: 0.01 },
  marginFrac: { min: 0, max: 0.5, step: 0.01 }
};

export const VARIANTS: readonly LogoVariant[] = ['split', 'helix'];

export const isVariant = (value: unknown): value is LogoVariant =>
  typeof value === 'string' && VARIANTS.some((variant) => variant === value);

export const NUMERIC_PARAM_KEYS: readonly NumericParamKey[] = [
  'diameter',
  'wavelengthFrac',
  'amplitudeFrac',
  'phase',
  'baselineFrac',
  'lineWidth',
  'waveProjection',
  'waveAdj1',
  'waveAdj2',
  'marginFrac'
];

export const COLOR_PARAM_KEYS: readonly ColorParamKey[] = ['fg1', 'fg2', 'bg', 'strokeColor'];

const isColorKey = (key: string): key is ColorParamKey => COLOR_PARAM_KEYS.some((colorKey) => colorKey === key);

export const resetParams = (): LogoParams => ({ ...DEFAULT_PARAMS });

export const clampParam = (key: NumericParamKey, value: number) => {
  const { min, max } = PARAM_RANGES[key];
  if (!Number.isFinite(value)) return DEFAULT_PARAMS[key];
  return Math.min(max, Math.max(min, value));
};

export function updateParam(params: LogoParams, key: NumericParamKey, value: number): LogoParams;
export function updateParam(params: LogoParams, key: ColorParamKey, value: string): LogoParams;
export function updateParam(params: LogoParams, key: 'variant', value: LogoVariant): LogoParams;
export function updateParam(
  params: LogoParams,
  key: NumericParamKey | ColorParamKey | 'variant',
  value: number | string
): LogoParams {
  const next = { ...params };
  if (typeof value === 'number') {
    if (key === 'variant' || isColorKey(key)) return params;
    next[key] = clampParam(key, value);
    return next;
  }
  if (key === 'variant') {
    return isVariant(value) ? { ...params, variant: value } : params;
  }
  if (isColorKey(key)) {
    next[key] = value;
    return next;
  }
  return params;
}

const requireFinite = (params: LogoParams, key: NumericParamKey) => {
  if (!Number.isFinite(params[key])) {
    throw new InvalidParameterError(key, `must be a finite number, got ${params[key]}`);
  }
};

/**
 * Throws InvalidParameterError on the first bad value. Runs before any
 * geometry so a failed render emits nothing.
 */
export const validateParams = (params: LogoParams): LogoParams => {
  if (!isVariant(params.variant)) {
    throw new InvalidParameterError('variant', `expected one of ${VARIANTS.join(', ')}, got ${String(params.variant)}`);
  }
  for (const key of NUMERIC_PARAM_KEYS) {
    requireFinite(params, key);
  }
  if (params.diameter <= 0) throw new InvalidParameterError('diameter', 'must be positive');
  if (params.wavelengthFrac <= 0) throw new InvalidParameterError('wavelengthFrac', 'must be positive');
  if (params.amplitudeFrac < 0) throw new InvalidParameterError('amplitudeFrac', 'must not be negative');
  if (params.lineWidth < 0) throw new InvalidParameterError('lineWidth', 'must not be negative');
  if (params.marginFrac < 0) throw new InvalidParameterError('marginFrac', 'must not be negative');
  if (params.waveProjection <= -1) throw new InvalidParameterError('waveProjection', 'must be greater than -1');
  if (params.variant === 'helix' && params.lineWidth >= params.diameter) {
    throw new InvalidParameterError('lineWidth', 'must be smaller than the diameter');
  }

  const colors: [ColorParamKey, boolean][] = [
    ['fg1', false],
    ['fg2', false],
    ['bg', true],
    ['strokeColor', false]
  ];
  for (const [key, allowNone] of colors) {
    if (!isValidColor(params[key], allowNone)) {
      throw new InvalidParameterError(key, `malformed color "${params[key]}"`);
    }
  }
  return params;
};

export const radiusFor = (params: LogoParams) =>
  params.variant === 'helix' ? params.diameter / 2 - params.lineWidth / 2 : params.diameter / 2;

export const circleSpecFromParams = (params: LogoParams): CircleSpec => ({
  center: { x: 0, y: 0 },
  radius: radiusFor(params)
});

/**
 * Phase 0 puts the wave's lowest screen point at the centre. The helix's
 * second wave runs half a turn behind the first, with its own shift.
 */
export const waveSpecFromParams = (params: LogoParams, index: 0 | 1 = 0): WaveSpec => ({
  amplitude: params.amplitudeFrac * params.diameter,
  angularFrequency: TAU / (params.wavelengthFrac * params.diameter),
  phase: params.phase + Math.PI / 2 + (index === 1 ? Math.PI : 0),
  baseline: params.baselineFrac * params.diameter,
  shift: (index === 1 ? params.waveAdj2 : params.waveAdj1) * params.diameter
});

/** Fill and outline of the split variant. A zero line width drops the outline. */
export const styleFromParams = (params: LogoParams): StyleSpec => ({
  upperFill: params.fg2,
  lowerFill: params.fg1,
  background: params.bg,
  strokeColor: params.lineWidth > 0 ? params.strokeColor : NO_COLOR,
  strokeWidth: params.lineWidth
});
