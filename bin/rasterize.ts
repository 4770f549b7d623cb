import sharp from 'sharp';

export interface RasterOptions {
  /** Output width in pixels; height follows the SVG's aspect ratio. */
  width?: number;
}

const SVG_SIZE = /<svg[^>]*\swidth="([\d.]+)"/;

/**
 * Renders SVG markup to PNG bytes. The density is raised to match the target
 * width so large exports are rendered, not upscaled.
 */
export const rasterizeSvg = async (svg: string, options: RasterOptions = {}): Promise<Buffer> => {
  const intrinsicWidth = Number(SVG_SIZE.exec(svg)?.[1] ?? 0);
  const input = Buffer.from(svg, 'utf-8');
  if (!options.width || !(intrinsicWidth > 0)) {
    return sharp(input).png().toBuffer();
  }
  const density = Math.min(2400, Math.max(1, (72 * options.width) / intrinsicWidth));
  return sharp(input, { density }).resize({ width: Math.round(options.width) }).png().toBuffer();
};
