import { afterEach, describe, expect, it, vi } from 'vitest';
import { downloadSvg, rasterizeInBrowser, svgToDataUrl } from '../exportImage';

describe('exportImage', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('encodes markup as a data url', () => {
    expect(svgToDataUrl('<svg/>')).toBe('data:image/svg+xml;charset=utf-8,%3Csvg%2F%3E');
  });

  it('downloads through a temporary link', () => {
    const names: string[] = [];
    const click = vi.spyOn(HTMLAnchorElement.prototype, 'click').mockImplementation(() => {
      names.push(document.querySelector('a')?.download ?? '');
    });
    const revoke = vi.spyOn(URL, 'revokeObjectURL');

    downloadSvg('<svg/>', 'logo-split.svg');

    expect(click).toHaveBeenCalledTimes(1);
    expect(names).toEqual(['logo-split.svg']);
    expect(revoke).toHaveBeenCalledTimes(1);
    expect(document.querySelector('a')).toBeNull();
  });

  it('fails when no canvas context is available', async () => {
    await expect(rasterizeInBrowser('<svg/>', { width: 10, height: 10 })).rejects.toThrow(
      'Canvas 2D context is not available'
    );
  });
});
