import type { LogoParams, LogoScene } from '../types';
import { isLogoError } from './errors';
import { composeLogo } from './logoEngine';
import { renderSvg } from './svgDocument';

/** A rendered logo together with the params that produced it. */
export interface RenderedLogo {
  params: LogoParams;
  scene: LogoScene;
  svg: string;
}

export type RenderResult = ({ ok: true } & RenderedLogo) | { ok: false; error: string };

export const renderLogo = (params: LogoParams): RenderResult => {
  try {
    const scene = composeLogo(params);
    return { ok: true, params, scene, svg: renderSvg(scene) };
  } catch (err) {
    if (isLogoError(err)) {
      console.warn(`Logo render rejected (${err.code}):`, err.message);
      return { ok: false, error: err.message };
    }
    console.error('Logo render failed:', err);
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
};

/** The logo to display: the current one, or the last good one while the current params fail. */
export const displayedLogo = (result: RenderResult, lastGood: RenderedLogo | null): RenderedLogo | null =>
  result.ok ? { params: result.params, scene: result.scene, svg: result.svg } : lastGood;
