import type { DrawnShape, LogoScene } from '../types';
import { containsPath } from './canvasBounds';
import { NO_COLOR, escapeXml } from './colors';
import { SamplingFaultError } from './errors';
import { formatNumber, subPathToPathData } from './pathCommands';

const SVG_NS = 'http://www.w3.org/2000/svg';

const attrs = (values: Record<string, string | number>) =>
  Object.entries(values)
    .map(([key, value]) => `${key}="${escapeXml(typeof value === 'number' ? formatNumber(value) : value)}"`)
    .join(' ');

const shapeElement = (shape: DrawnShape) => {
  const stroked = shape.stroke !== NO_COLOR && shape.strokeWidth > 0;
  const values: Record<string, string | number> = {
    d: shape.paths.map(subPathToPathData).join(' '),
    fill: shape.fill
  };
  if (stroked) {
    values.stroke = shape.stroke;
    values['stroke-width'] = shape.strokeWidth;
    values['stroke-linecap'] = shape.lineCap;
    values['stroke-linejoin'] = 'round';
  }
  return `  <path ${attrs(values)}/>`;
};

/**
 * Serializes a composed scene. Every path, grown by half its stroke, must sit
 * inside the scene bounds; otherwise nothing is emitted.
 */
export const renderSvg = (scene: LogoScene): string => {
  const { bounds } = scene;
  for (const shape of scene.shapes) {
    const inset = shape.stroke !== NO_COLOR ? shape.strokeWidth / 2 : 0;
    for (const path of shape.paths) {
      if (!containsPath(bounds, path, inset)) {
        throw new SamplingFaultError('geometry escapes the canvas bounds');
      }
    }
  }

  const lines = [
    `<svg ${attrs({
      xmlns: SVG_NS,
      width: bounds.width,
      height: bounds.height,
      viewBox: [bounds.x, bounds.y, bounds.width, bounds.height].map(formatNumber).join(' ')
    })}>`
  ];
  if (scene.background.trim().toLowerCase() !== NO_COLOR) {
    lines.push(`  <rect ${attrs({ ...bounds, fill: scene.background })}/>`);
  }
  for (const shape of scene.shapes) {
    lines.push(shapeElement(shape));
  }
  lines.push('</svg>');
  return `${lines.join('\n')}\n`;
};
