import React, { useCallback, useEffect, useMemo, useRef, useState } from 'react';
import type { ColorParamKey, LogoParams, LogoVariant, NumericParamKey } from './types';
import { type RenderedLogo, displayedLogo, renderLogo } from './services/logoRender';
import { resetParams, updateParam } from './services/params';
import { downloadBlob, downloadSvg, rasterizeInBrowser } from './services/exportImage';
import ControlPanel from './components/ControlPanel';
import LogoPreview from './components/LogoPreview';
import GeometryPanel from './components/GeometryPanel';

const PNG_EXPORT_SCALE = 2;

const App: React.FC = () => {
  const [params, setParams] = useState<LogoParams>(resetParams);
  const [showMath, setShowMath] = useState(false);
  const lastGoodRef = useRef<RenderedLogo | null>(null);

  const result = useMemo(() => renderLogo(params), [params]);

  useEffect(() => {
    if (result.ok) lastGoodRef.current = displayedLogo(result, null);
  }, [result]);

  const shown = displayedLogo(result, lastGoodRef.current);
  const error = result.ok ? null : result.error;

  const handleNumberChange = useCallback((key: NumericParamKey, value: number) => {
    setParams((p) => updateParam(p, key, value));
  }, []);

  const handleColorChange = useCallback((key: ColorParamKey, value: string) => {
    setParams((p) => updateParam(p, key, value));
  }, []);

  const handleVariantChange = useCallback((variant: LogoVariant) => {
    setParams((p) => updateParam(p, 'variant', variant));
  }, []);

  const handleReset = useCallback(() => setParams(resetParams()), []);

  const handleDownloadSvg = useCallback(() => {
    if (!result.ok) return;
    downloadSvg(result.svg, `logo-${params.variant}.svg`);
  }, [params.variant, result]);

  const handleDownloadPng = useCallback(() => {
    if (!result.ok) return;
    const { bounds } = result.scene;
    rasterizeInBrowser(result.svg, bounds, bounds.width * PNG_EXPORT_SCALE)
      .then((blob) => downloadBlob(blob, `logo-${params.variant}.png`))
      .catch((err) => {
        console.error('PNG export failed:', err);
      });
  }, [params.variant, result]);

  return (
    <div className="logo-designer grid gap-8 lg:grid-cols-2 p-6 text-slate-100" data-variant={params.variant}>
      <div className="space-y-6">
        <h1 className="text-2xl font-bold">
          Wave<span className="text-cyan-400">Logo</span> Designer
        </h1>
        <ControlPanel
          params={params}
          onNumberChange={handleNumberChange}
          onColorChange={handleColorChange}
          onVariantChange={handleVariantChange}
          onReset={handleReset}
          onDownloadSvg={handleDownloadSvg}
          onDownloadPng={handleDownloadPng}
          showMath={showMath}
          setShowMath={setShowMath}
          canExport={result.ok}
        />
        {showMath && shown && <GeometryPanel params={shown.params} scene={shown.scene} />}
      </div>

      <LogoPreview svg={shown?.svg ?? ''} error={error} />
    </div>
  );
};

export default App;
