import React, { useMemo } from 'react';
import { svgToDataUrl } from '../services/exportImage';

interface LogoPreviewProps {
  svg: string;
  error: string | null;
}

const LogoPreview: React.FC<LogoPreviewProps> = ({ svg, error }) => {
  const src = useMemo(() => svgToDataUrl(svg), [svg]);

  return (
    <section className="logo-preview space-y-4" aria-label="Preview">
      <h2 className="text-lg font-semibold text-slate-100">Large Preview</h2>
      {error && (
        <div role="alert" className="rounded-lg border border-red-500/50 bg-red-500/10 px-3 py-2 text-sm text-red-300">
          {error}
        </div>
      )}
      <img src={src} alt="Logo preview" className="w-full h-auto rounded-lg" />
      <h3 className="text-sm font-semibold text-slate-300">Mini Preview</h3>
      <img src={src} alt="Logo thumbnail" width={30} />
    </section>
  );
};

export default LogoPreview;
