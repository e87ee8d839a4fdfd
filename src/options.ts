import path from 'node:path';
import type { BlurConfig } from './config.js';
import { BlurError } from './errors.js';
import { MAX_RADIUS } from './kernel.js';

const MAX_ARGS = 8;

export interface BlurCommand {
  help: false;
  radius: number;
  sigma: number;
  threads: number;
  batchSize: number;
  source: string;
  destination: string;
  sequential: boolean;
  quiet: boolean;
}

export type ParsedArgs = BlurCommand | { help: true };

export function usageText(defaults: BlurConfig): string {
  return [
    'Usage: blur [--radius|-r <radius>] [--sigma|-s <sigma>] [--threads|-t <n_threads>] <source> [<destination>]',
    '',
    '   <source>            Path to original image.',
    '   <destination>       Path of the blurred image. Default is',
    '                       <source>_blurred_<radius>x<sigma>.',
    '',
    `   -r, --radius        Blur radius. Default is ${defaults.radius}px.`,
    `   -s, --sigma         Gaussian blur standard deviation. Default is ${defaults.sigma}.`,
    `   -t, --threads       Number of worker threads. Default is ${defaults.threads}.`,
    '       --sequential    Blur on the main thread only.',
    '   -q, --quiet         Suppress progress output.',
    '   -h, --help          Prints this help.',
  ].join('\n');
}

/** `photos/cat.png` with radius 3, sigma 1.5 -> `photos/cat_blurred_3x1.5.png` */
export function defaultOutputPath(source: string, radius: number, sigma: number): string {
  const { dir, name, ext } = path.parse(source);
  if (!ext) {
    throw new BlurError(
      `Cannot derive an output path: ${source} has no file extension`,
      'INVALID_ARGUMENT',
    );
  }
  return path.join(dir, `${name}_blurred_${radius}x${sigma}${ext}`);
}

/**
 * Parse CLI arguments (without the node and script entries).
 * Positionals are source then destination; flags may appear anywhere.
 */
export function parseBlurArgs(args: string[], defaults: BlurConfig): ParsedArgs {
  if (args.length > MAX_ARGS) {
    throw new BlurError('Too many arguments', 'INVALID_ARGUMENT');
  }

  let { radius, sigma, threads } = defaults;
  let sequential = false;
  let quiet = false;
  const positionals: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]!;
    switch (arg) {
      case '--radius':
      case '-r':
        radius = parseInteger(args[++i], '--radius|-r', 0, MAX_RADIUS);
        break;
      case '--sigma':
      case '-s':
        sigma = parseSigma(args[++i]);
        break;
      case '--threads':
      case '-t':
        threads = parseInteger(args[++i], '--threads|-t', 1, Number.MAX_SAFE_INTEGER);
        break;
      case '--sequential':
        sequential = true;
        break;
      case '--quiet':
      case '-q':
        quiet = true;
        break;
      case '--help':
      case '-h':
        return { help: true };
      default:
        if (arg.startsWith('-') && arg.length > 1) {
          throw new BlurError(`Unknown option ${arg}`, 'INVALID_ARGUMENT');
        }
        positionals.push(arg);
    }
  }

  if (positionals.length > 2) {
    throw new BlurError(`Unexpected argument ${positionals[2]}`, 'INVALID_ARGUMENT');
  }
  const [source, destination] = positionals;
  if (source === undefined) {
    throw new BlurError('Expected an original image', 'INVALID_ARGUMENT');
  }

  return {
    help: false,
    radius,
    sigma,
    threads,
    batchSize: defaults.batchSize,
    source,
    destination: destination ?? defaultOutputPath(source, radius, sigma),
    sequential,
    quiet,
  };
}

function parseInteger(value: string | undefined, flag: string, min: number, max: number): number {
  if (value === undefined) {
    throw new BlurError(`Expected a value after ${flag}`, 'INVALID_ARGUMENT');
  }
  const parsed = /^\d+$/.test(value) ? Number(value) : NaN;
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new BlurError(
      `Expected an integer in [${min}, ${max}] after ${flag}, got "${value}"`,
      'INVALID_ARGUMENT',
    );
  }
  return parsed;
}

function parseSigma(value: string | undefined): number {
  if (value === undefined) {
    throw new BlurError('Expected a value after --sigma|-s', 'INVALID_ARGUMENT');
  }
  const parsed = value.trim() === '' ? NaN : Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new BlurError(
      `Expected a positive number after --sigma|-s, got "${value}"`,
      'INVALID_ARGUMENT',
    );
  }
  return parsed;
}
