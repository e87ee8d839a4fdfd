/**
 * compare-paths.ts -- Time the sequential and parallel blur on one image and
 * check that they produce identical bytes.
 *
 * Without an image, a 256x256 gradient is generated.
 *
 * Usage:
 *   npx tsx scripts/compare-paths.ts
 *   npx tsx scripts/compare-paths.ts photo.png --radius 4 --sigma 2 --threads 8
 */

import os from 'node:os';
import { blurParallel, blurSequential } from '../src/blur.js';
import { loadRgbImage } from '../src/image-io.js';
import { createRaster, rastersEqual, setPixel } from '../src/raster.js';
import { silentLogger, type RgbRaster } from '../src/types.js';

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

const args = process.argv.slice(2);

function flagValue(name: string, fallback: number): number {
  const idx = args.indexOf(name);
  if (idx < 0) return fallback;
  const value = Number(args[idx + 1]);
  if (Number.isNaN(value)) {
    console.error(`Invalid ${name} value`);
    process.exit(1);
  }
  return value;
}

const RADIUS = flagValue('--radius', 3);
const SIGMA = flagValue('--sigma', 2);
const THREADS = flagValue('--threads', Math.max(1, os.availableParallelism() - 1));
const FIRST_ARG = args[0];
const IMAGE_PATH = FIRST_ARG !== undefined && !FIRST_ARG.startsWith('--') ? FIRST_ARG : null;

function gradient(width: number, height: number): RgbRaster {
  const raster = createRaster(width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      setPixel(raster, x, y, [x % 256, y % 256, (x * y) % 256]);
    }
  }
  return raster;
}

async function main(): Promise<void> {
  const source = IMAGE_PATH ? await loadRgbImage(IMAGE_PATH) : gradient(256, 256);
  console.log(
    `[compare] ${source.width}x${source.height}, radius ${RADIUS}, sigma ${SIGMA}, ${THREADS} threads`,
  );

  let start = performance.now();
  const sequential = blurSequential(RADIUS, SIGMA, source, { logger: silentLogger });
  const sequentialMs = performance.now() - start;

  start = performance.now();
  const parallel = await blurParallel(RADIUS, SIGMA, THREADS, source, { logger: silentLogger });
  const parallelMs = performance.now() - start;

  console.log(`  sequential: ${sequentialMs.toFixed(0)} ms`);
  console.log(`  parallel:   ${parallelMs.toFixed(0)} ms`);

  const identical = rastersEqual(sequential, parallel);
  console.log(`  identical:  ${identical ? 'yes' : 'NO'}`);
  if (!identical) process.exit(1);
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
