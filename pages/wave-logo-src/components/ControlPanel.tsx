import React from 'react';
import { Calculator, Dna, Download, Image as ImageIcon, Palette, RotateCcw, Waves } from 'lucide-react';
import type { ColorParamKey, LogoParams, LogoVariant, NumericParamKey } from '../types';
import { DEFAULT_PARAMS, PARAM_RANGES } from '../services/params';
import { NO_COLOR, toColorInputValue } from '../services/colors';

interface ControlPanelProps {
  params: LogoParams;
  onNumberChange: (key: NumericParamKey, value: number) => void;
  onColorChange: (key: ColorParamKey, value: string) => void;
  onVariantChange: (variant: LogoVariant) => void;
  onReset: () => void;
  onDownloadSvg: () => void;
  onDownloadPng: () => void;
  showMath: boolean;
  setShowMath: (s: boolean) => void;
  canExport: boolean;
}

interface SliderRowProps {
  label: string;
  name: NumericParamKey;
  value: number;
  onChange: (key: NumericParamKey, value: number) => void;
}

const decimalsFor = (step: number) => (Number.isInteger(step) ? 0 : String(step).split('.')[1]?.length ?? 2);

// Slider and number box stay in sync because both read the same param value.
const SliderRow: React.FC<SliderRowProps> = ({ label, name, value, onChange }) => {
  const range = PARAM_RANGES[name];
  const handle = (raw: string) => {
    const parsed = parseFloat(raw);
    if (Number.isFinite(parsed)) onChange(name, parsed);
  };

  return (
    <label className="grid grid-cols-[1fr_5rem] items-center gap-x-3 gap-y-1 text-sm text-slate-300">
      <span className="col-span-2 text-xs uppercase tracking-wide text-slate-400">{label}</span>
      <input
        type="range"
        aria-label={label}
        min={range.min}
        max={range.max}
        step={range.step}
        value={value}
        onChange={(e) => handle(e.target.value)}
        className="w-full h-1 bg-slate-700 rounded-lg appearance-none cursor-pointer accent-cyan-400"
      />
      <input
        type="number"
        aria-label={`${label} value`}
        min={range.min}
        max={range.max}
        step={range.step}
        value={Number(value.toFixed(decimalsFor(range.step)))}
        onChange={(e) => handle(e.target.value)}
        className="w-full rounded bg-slate-800 border border-slate-700 px-2 py-1 text-right font-mono text-slate-100"
      />
    </label>
  );
};

const SLIDERS: { key: NumericParamKey; label: string; variants?: LogoVariant[] }[] = [
  { key: 'diameter', label: 'Diameter (px)' },
  { key: 'wavelengthFrac', label: 'Wavelength (%)' },
  { key: 'amplitudeFrac', label: 'Amplitude (%)' },
  { key: 'phase', label: 'Phase (rad)' },
  { key: 'baselineFrac', label: 'Baseline (%)' },
  { key: 'lineWidth', label: 'Line width (px)' },
  { key: 'waveProjection', label: 'Global projection (%)', variants: ['helix'] },
  { key: 'waveAdj1', label: 'Wave adj 1 (%)', variants: ['helix'] },
  { key: 'waveAdj2', label: 'Wave adj 2 (%)', variants: ['helix'] },
  { key: 'marginFrac', label: 'Margin (%)' }
];

const COLORS: { key: ColorParamKey; label: string; variants?: LogoVariant[] }[] = [
  { key: 'fg1', label: 'Color fg1' },
  { key: 'fg2', label: 'Color fg2' },
  { key: 'bg', label: 'Background' },
  { key: 'strokeColor', label: 'Outline', variants: ['split'] }
];

const ControlPanel: React.FC<ControlPanelProps> = ({
  params,
  onNumberChange,
  onColorChange,
  onVariantChange,
  onReset,
  onDownloadSvg,
  onDownloadPng,
  showMath,
  setShowMath,
  canExport
}) => {
  const btnClass = (active: boolean) => `
    p-2.5 rounded-lg transition-all duration-200 flex items-center justify-center gap-2 text-sm
    ${active
      ? 'bg-cyan-500/20 text-cyan-400 border border-cyan-500/50 shadow-[0_0_15px_rgba(6,182,212,0.3)]'
      : 'bg-slate-800/50 text-slate-400 hover:bg-slate-700 hover:text-slate-200 border border-transparent'}
  `;

  const visible = <T extends { variants?: LogoVariant[] }>(item: T) =>
    !item.variants || item.variants.includes(params.variant);

  return (
    <section className="logo-controls space-y-5" aria-label="Logo parameters">
      <div className="flex items-center gap-2">
        <button
          type="button"
          onClick={() => onVariantChange('split')}
          className={btnClass(params.variant === 'split')}
          aria-pressed={params.variant === 'split'}
          title="Split circle"
        >
          <Waves size={18} /> Split
        </button>
        <button
          type="button"
          onClick={() => onVariantChange('helix')}
          className={btnClass(params.variant === 'helix')}
          aria-pressed={params.variant === 'helix'}
          title="Double wave"
        >
          <Dna size={18} /> Helix
        </button>

        <div className="h-6 w-px bg-slate-700 mx-1"></div>

        <button type="button" onClick={onReset} className={btnClass(false)} title="Reset to defaults">
          <RotateCcw size={18} /> Reset
        </button>
        <button
          type="button"
          onClick={() => setShowMath(!showMath)}
          className={btnClass(showMath)}
          title="Toggle Geometry Panel"
        >
          <Calculator size={18} />
        </button>
      </div>

      <div className="space-y-4">
        {SLIDERS.filter(visible).map(({ key, label }) => (
          <SliderRow key={key} label={label} name={key} value={params[key]} onChange={onNumberChange} />
        ))}
      </div>

      <div className="flex flex-wrap gap-4">
        {COLORS.filter(visible).map(({ key, label }) => (
          <label key={key} className="flex items-center gap-2 text-sm text-slate-300" title={label}>
            <Palette size={16} className="text-slate-400" />
            <input
              type="color"
              aria-label={label}
              value={toColorInputValue(params[key])}
              onChange={(e) => onColorChange(key, e.target.value)}
              className="w-6 h-6 rounded border-none cursor-pointer bg-transparent"
            />
            <span>{label}</span>
            {key === 'bg' && (
              <input
                type="checkbox"
                aria-label="Transparent background"
                title="Transparent"
                checked={params.bg === NO_COLOR}
                onChange={(e) => onColorChange('bg', e.target.checked ? NO_COLOR : DEFAULT_PARAMS.bg)}
                className="accent-cyan-400"
              />
            )}
          </label>
        ))}
      </div>

      <div className="flex gap-2">
        <button type="button" onClick={onDownloadSvg} disabled={!canExport} className={btnClass(false)} title="Download SVG">
          <Download size={18} /> SVG
        </button>
        <button type="button" onClick={onDownloadPng} disabled={!canExport} className={btnClass(false)} title="Download PNG">
          <ImageIcon size={18} /> PNG
        </button>
      </div>
    </section>
  );
};

export default ControlPanel;
