import React, { useEffect, useMemo, useRef } from 'react';
import katex from 'katex';
import 'katex/dist/katex.min.css';
import type { LogoParams, LogoScene } from '../types';
import { waveSpecFromParams, radiusFor } from '../services/params';
import { shapeArea } from '../services/logoEngine';

interface GeometryPanelProps {
  params: LogoParams;
  scene: LogoScene;
}

const GeometryPanel: React.FC<GeometryPanelProps> = ({ params, scene }) => {
  const latexContainerRef = useRef<HTMLDivElement>(null);

  const stats = useMemo(() => {
    const wave = waveSpecFromParams(params);
    return {
      radius: radiusFor(params).toFixed(1),
      amplitude: wave.amplitude.toFixed(1),
      omega: wave.angularFrequency.toFixed(4),
      phase: wave.phase.toFixed(3),
      baseline: wave.baseline.toFixed(1)
    };
  }, [params]);

  const coverage = useMemo(() => {
    const filled = scene.shapes.filter((s) => s.fill !== 'none').map((s) => ({ fill: s.fill, area: shapeArea(s) }));
    const total = filled.reduce((sum, s) => sum + s.area, 0);
    return total > 0 ? filled.map((s) => ({ fill: s.fill, share: (100 * s.area) / total })) : [];
  }, [scene]);

  useEffect(() => {
    if (!latexContainerRef.current) return;
    const { radius, amplitude, omega, phase, baseline } = stats;
    katex.render(
      `
      \\begin{aligned}
        y(x) &= ${baseline} + ${amplitude}\\,\\sin\\left(${omega}\\,x + ${phase}\\right) \\\\
        x^2 + y^2 &= ${radius}^2
      \\end{aligned}
      `,
      latexContainerRef.current,
      { throwOnError: false, displayMode: true }
    );
  }, [stats]);

  return (
    <aside className="logo-geometry bg-slate-900/80 border border-slate-700 rounded-lg p-4 text-slate-200 space-y-3">
      <div className="text-xs uppercase tracking-wide text-slate-400">Geometry</div>
      <div ref={latexContainerRef} />
      <div className="text-sm">
        Canvas {scene.bounds.width} × {scene.bounds.height} px · {scene.intersections.length} crossings
      </div>
      {coverage.length > 0 && (
        <ul className="flex gap-4 text-xs">
          {coverage.map((c, idx) => (
            <li key={`${idx}-${c.fill}`} className="flex items-center gap-2">
              <span className="inline-block w-3 h-3 rounded-sm" style={{ backgroundColor: c.fill }} />
              {c.share.toFixed(1)}%
            </li>
          ))}
        </ul>
      )}
      {scene.intersections.length > 0 && (
        <ol className="text-xs font-mono text-slate-300 max-h-40 overflow-y-auto custom-scrollbar">
          {scene.intersections.map((p, idx) => (
            <li key={`${idx}-${p.angle}`}>
              θ={p.angle.toFixed(4)} ({p.x.toFixed(2)}, {p.y.toFixed(2)}) {p.direction}
            </li>
          ))}
        </ol>
      )}
    </aside>
  );
};

export default GeometryPanel;
