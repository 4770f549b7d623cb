import { describe, expect, it } from 'vitest';
import type { LogoParams, LogoScene, Point } from '../../types';
import { composeLogo, generateLogoSvg, shapeArea } from '../logoEngine';
import { containsPath } from '../canvasBounds';
import { segmentEnd, segmentStart } from '../geometry';
import { resetParams } from '../params';
import { renderSvg } from '../svgDocument';
import { InvalidParameterError } from '../errors';

const params = (overrides: Partial<LogoParams> = {}): LogoParams => ({ ...resetParams(), ...overrides });

const expectInside = (scene: LogoScene) => {
  for (const shape of scene.shapes) {
    const inset = shape.stroke === 'none' ? 0 : shape.strokeWidth / 2;
    for (const path of shape.paths) {
      expect(containsPath(scene.bounds, path, inset)).toBe(true);
    }
  }
};

describe('composeLogo (split)', () => {
  it('fills the region above the wave with fg2 and the one below with fg1', () => {
    const scene = composeLogo(params());
    expect(scene.shapes).toHaveLength(2);
    expect(scene.shapes.map((s) => s.fill)).toEqual(['#C4EF87', '#63C5DA']);
    for (const shape of scene.shapes) {
      expect(shape.stroke).toBe('#27374D');
      expect(shape.strokeWidth).toBe(40);
      expect(shape.paths).toHaveLength(1);
    }
    expect(scene.intersections).toHaveLength(2);
    expect(scene.background).toBe('#27374D');
  });

  it('sizes the canvas to the circle, half the stroke and the margin', () => {
    const scene = composeLogo(params());
    expect(scene.bounds).toEqual({ x: 0, y: 0, width: 700, height: 700 });
    expectInside(scene);
  });

  it('drops the outline and its padding for a zero line width', () => {
    const scene = composeLogo(params({ lineWidth: 0 }));
    expect(scene.bounds).toEqual({ x: 0, y: 0, width: 660, height: 660 });
    expect(scene.shapes.every((s) => s.stroke === 'none')).toBe(true);
  });

  it('moves the crossings onto the canvas with the shapes', () => {
    const scene = composeLogo(params());
    for (const p of scene.intersections) {
      expect(Math.hypot(p.x - 350, p.y - 350)).toBeCloseTo(300, 6);
    }
  });

  it('splits the disk area between the two fills', () => {
    const scene = composeLogo(params({ lineWidth: 0 }));
    const [upper, lower] = scene.shapes.map(shapeArea);
    expect(Math.abs(upper + lower - Math.PI * 300 * 300)).toBeLessThan(10);
  });

  it('keeps a full disk when the wave misses the circle', () => {
    const scene = composeLogo(params({ amplitudeFrac: 0, baselineFrac: 0.6 }));
    expect(scene.intersections).toEqual([]);
    expect(scene.shapes).toHaveLength(1);
    expect(scene.shapes[0].fill).toBe('#C4EF87');
    expect(scene.bounds).toEqual({ x: 0, y: 0, width: 700, height: 700 });
  });

  it('stays on the canvas for a busy wave', () => {
    const scene = composeLogo(params({ wavelengthFrac: 0.15, amplitudeFrac: 0.3, phase: 1.1, baselineFrac: 0.05 }));
    expect(scene.intersections.length % 2).toBe(0);
    expectInside(scene);
  });

  it('splits the disk for steep waves as tall as the circle', () => {
    for (const wavelengthFrac of [0.01, 0.02, 0.03]) {
      for (const phase of [0, 0.5, 1.3, 2.9]) {
        for (const baselineFrac of [0, 0.1]) {
          const scene = composeLogo(params({ wavelengthFrac, amplitudeFrac: 0.5, phase, baselineFrac, lineWidth: 0 }));
          const total = scene.shapes.reduce((sum, shape) => sum + shapeArea(shape), 0);
          expect(Math.abs(total - Math.PI * 300 * 300)).toBeLessThan(10);
        }
      }
    }
  });

  it('rejects invalid parameters before any geometry', () => {
    expect(() => composeLogo(params({ diameter: -1 }))).toThrow(InvalidParameterError);
    expect(() => composeLogo(params({ bg: 'transparent' }))).toThrow(InvalidParameterError);
  });
});

describe('composeLogo (helix)', () => {
  it('draws an arc and a wave in each color', () => {
    const scene = composeLogo(params({ variant: 'helix' }));
    expect(scene.shapes).toHaveLength(4);
    expect(scene.shapes.map((s) => [s.stroke, s.lineCap])).toEqual([
      ['#C4EF87', 'butt'],
      ['#63C5DA', 'butt'],
      ['#C4EF87', 'round'],
      ['#63C5DA', 'round']
    ]);
    expect(scene.shapes.every((s) => s.fill === 'none' && s.strokeWidth === 40)).toBe(true);
    expect(scene.intersections).toHaveLength(4);
    expectInside(scene);
  });

  it('runs the first arc over the top and the second under the bottom', () => {
    const scene = composeLogo(params({ variant: 'helix' }));
    const [top, bottom] = scene.shapes.map((s) => s.paths[0].segments[0]);
    expect(top.kind === 'arc' && top.sweepAngle < 0).toBe(true);
    expect(bottom.kind === 'arc' && bottom.sweepAngle < 0).toBe(true);
    if (top.kind !== 'arc' || bottom.kind !== 'arc') return;
    const topMid = top.startAngle + top.sweepAngle / 2;
    const bottomMid = bottom.startAngle + bottom.sweepAngle / 2;
    expect(Math.sin(topMid)).toBeLessThan(0);
    expect(Math.sin(bottomMid)).toBeGreaterThan(0);
  });

  it('stretches the waves past the circle with a positive projection', () => {
    const scene = composeLogo(params({ variant: 'helix', waveProjection: 0.1 }));
    const wave = scene.shapes[2].paths[0].segments[0];
    expect(wave.kind).toBe('polyline');
    if (wave.kind !== 'polyline') return;
    const span = wave.points[wave.points.length - 1].x - wave.points[0].x;
    const [a, b] = scene.intersections;
    expect(span).toBeCloseTo(Math.abs(a.x - b.x) * 1.1, 6);
    expectInside(scene);
  });

  it('bends each arc out to meet the projected ends of its wave', () => {
    const scene = composeLogo(params({ variant: 'helix', waveProjection: 0.2 }));
    const [top, bottom, first, second] = scene.shapes.map((s) => s.paths[0].segments[0]);
    const expectMeets = (a: Point, b: Point) => {
      expect(a.x).toBeCloseTo(b.x, 6);
      expect(a.y).toBeCloseTo(b.y, 6);
    };
    // The top arc runs right to left, the bottom one left to right; both waves run left to right.
    expectMeets(segmentStart(top), segmentEnd(first));
    expectMeets(segmentEnd(top), segmentStart(first));
    expectMeets(segmentStart(bottom), segmentStart(second));
    expectMeets(segmentEnd(bottom), segmentEnd(second));
    expectInside(scene);
  });

  it('draws nothing for waves that miss the circle', () => {
    const scene = composeLogo(params({ variant: 'helix', baselineFrac: 0.9 }));
    expect(scene.shapes).toEqual([]);
    expect(scene.intersections).toEqual([]);
  });
});

describe('generateLogoSvg', () => {
  it('renders the default logo deterministically', () => {
    const svg = generateLogoSvg(params());
    expect(svg).toBe(generateLogoSvg(params()));
    const lines = svg.split('\n');
    expect(lines[0]).toBe('<svg xmlns="http://www.w3.org/2000/svg" width="700" height="700" viewBox="0 0 700 700">');
    expect(lines[1]).toBe('  <rect x="0" y="0" width="700" height="700" fill="#27374D"/>');
    expect(lines.filter((line) => line.startsWith('  <path '))).toHaveLength(2);
    expect(lines[lines.length - 2]).toBe('</svg>');
  });

  it('matches renderSvg on the composed scene', () => {
    const p = params({ variant: 'helix', bg: 'none' });
    expect(generateLogoSvg(p)).toBe(renderSvg(composeLogo(p)));
  });
});
