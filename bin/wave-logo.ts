#!/usr/bin/env node_modules/.bin/tsx

import fs from 'fs';
import path from 'path';
import { pathToFileURL } from 'url';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import type { LogoParams } from '../pages/wave-logo-src/types';
import { InvalidParameterError } from '../pages/wave-logo-src/services/errors';
import { generateLogoSvg } from '../pages/wave-logo-src/services/logoEngine';
import { DEFAULT_PARAMS, isVariant } from '../pages/wave-logo-src/services/params';
import { rasterizeSvg } from './rasterize';

export type OutputFormat = 'svg' | 'png';

export interface CliOptions {
  output: string;
  format: OutputFormat;
  pngWidth?: number;
  params: LogoParams;
}

const parseFormat = (value: string): OutputFormat => {
  const v = value.toLowerCase();
  if (v === 'svg' || v === 'png') return v;
  throw new InvalidParameterError('format', `expected svg or png, got "${value}"`);
};

const parseVariant = (value: string) => {
  const v = value.toLowerCase();
  if (isVariant(v)) return v;
  throw new InvalidParameterError('variant', `expected split or helix, got "${value}"`);
};

export const parseCliArgs = async (argv: string[], exitProcess = false): Promise<CliOptions> => {
  const args = await yargs(argv)
    .scriptName('wave-logo')
    .usage('$0 <output> [options]\n\nGenerate a split-circle wave logo as SVG or PNG')
    .option('format', { type: 'string', default: 'svg', describe: 'Output format: svg or png' })
    .option('variant', { type: 'string', default: DEFAULT_PARAMS.variant, describe: 'split (filled halves) or helix (two stroked waves)' })
    .option('fg1', { type: 'string', default: DEFAULT_PARAMS.fg1, describe: 'Lower region / second wave color' })
    .option('fg2', { type: 'string', default: DEFAULT_PARAMS.fg2, describe: 'Upper region / first wave color' })
    .option('bg', { type: 'string', default: DEFAULT_PARAMS.bg, describe: "Background color, 'none' for transparent" })
    .option('stroke-color', { type: 'string', default: DEFAULT_PARAMS.strokeColor, describe: 'Outline color of the split variant' })
    .option('diameter', { type: 'number', default: DEFAULT_PARAMS.diameter, describe: 'Outer diameter in px' })
    .option('wavelength-frac', { type: 'number', alias: 'wavelength_frac', default: DEFAULT_PARAMS.wavelengthFrac, describe: 'Wavelength as fraction of diameter' })
    .option('amplitude-frac', { type: 'number', alias: 'amplitude_frac', default: DEFAULT_PARAMS.amplitudeFrac, describe: 'Amplitude as fraction of diameter' })
    .option('phase', { type: 'number', default: DEFAULT_PARAMS.phase, describe: 'Wave phase in radians' })
    .option('baseline-frac', { type: 'number', default: DEFAULT_PARAMS.baselineFrac, describe: 'Vertical wave offset as fraction of diameter (down is positive)' })
    .option('line-width', { type: 'number', alias: 'line_width', default: DEFAULT_PARAMS.lineWidth, describe: 'Line width in px' })
    .option('wave-projection', { type: 'number', alias: 'wave_projection_frac', default: DEFAULT_PARAMS.waveProjection, describe: '>0 extends; 0 matches; <0 contracts' })
    .option('wave-adj1', { type: 'number', alias: 'wave_adj1', default: DEFAULT_PARAMS.waveAdj1, describe: 'Horizontal shift of wave 1 (fraction of diameter)' })
    .option('wave-adj2', { type: 'number', alias: 'wave_adj2', default: DEFAULT_PARAMS.waveAdj2, describe: 'Horizontal shift of wave 2 (fraction of diameter)' })
    .option('margin-frac', { type: 'number', default: DEFAULT_PARAMS.marginFrac, describe: 'Canvas margin as fraction of diameter' })
    .option('png-width', { type: 'number', describe: 'PNG width in px (defaults to the SVG width)' })
    .demandCommand(1, 'An output file is required')
    .example('$0 logo.svg', 'Default logo as SVG')
    .example('$0 logo.png --format png --variant helix --png-width 1024', 'Double-wave logo as a 1024 px PNG')
    .strict()
    .exitProcess(exitProcess)
    .fail((msg, err) => {
      throw err ?? new Error(msg);
    })
    .help()
    .parseAsync();

  return {
    output: String(args._[0]),
    format: parseFormat(args.format),
    pngWidth: args['png-width'],
    params: {
      variant: parseVariant(args.variant),
      diameter: args.diameter,
      wavelengthFrac: args['wavelength-frac'],
      amplitudeFrac: args['amplitude-frac'],
      phase: args.phase,
      baselineFrac: args['baseline-frac'],
      lineWidth: args['line-width'],
      waveProjection: args['wave-projection'],
      waveAdj1: args['wave-adj1'],
      waveAdj2: args['wave-adj2'],
      marginFrac: args['margin-frac'],
      fg1: args.fg1,
      fg2: args.fg2,
      bg: args.bg,
      strokeColor: args['stroke-color']
    }
  };
};

/** Parses the arguments, writes the logo and returns the written path. */
export const runCli = async (argv: string[], exitProcess = false): Promise<string> => {
  const options = await parseCliArgs(argv, exitProcess);
  const svg = generateLogoSvg(options.params);
  const target = path.resolve(options.output);

  if (options.format === 'svg') {
    await fs.promises.writeFile(target, svg, 'utf-8');
  } else {
    await fs.promises.writeFile(target, await rasterizeSvg(svg, { width: options.pngWidth }));
  }

  console.log(`Logo saved to ${target}`);
  return target;
};

// npm links the bin, so compare against the resolved script path.
const invokedDirectly =
  process.argv[1] !== undefined && import.meta.url === pathToFileURL(fs.realpathSync(process.argv[1])).href;

if (invokedDirectly) {
  runCli(hideBin(process.argv), true).catch((error) => {
    console.error('Failed to generate logo:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
