import { CHANNELS } from './raster.js';
import type { Kernel, Rgb, RgbRaster } from './types.js';

/**
 * Compute one blurred pixel at (x, y).
 *
 * Taps that land outside the raster are skipped, not clamped or wrapped,
 * and the weighted sums are divided by the total weight of the taps that
 * were used. Edge pixels therefore average over fewer neighbours without
 * drifting darker or brighter. Channels are truncated, not rounded.
 *
 * (x, y) must lie inside the raster; the centre tap then always counts,
 * so the total weight is never zero.
 */
export function convolvePixel(x: number, y: number, kernel: Kernel, source: RgbRaster): Rgb {
  const { radius, size, weights } = kernel;
  const { width, height, data } = source;

  let r = 0;
  let g = 0;
  let b = 0;
  let total = 0;

  for (let dy = -radius; dy <= radius; dy++) {
    const sy = y + dy;
    if (sy < 0 || sy >= height) continue;
    const row = (dy + radius) * size + radius;

    for (let dx = -radius; dx <= radius; dx++) {
      const sx = x + dx;
      if (sx < 0 || sx >= width) continue;

      const w = weights[row + dx]!;
      const offset = (sy * width + sx) * CHANNELS;
      r += data[offset]! * w;
      g += data[offset + 1]! * w;
      b += data[offset + 2]! * w;
      total += w;
    }
  }

  return [toByte(r / total), toByte(g / total), toByte(b / total)];
}

// Absorbs the last-bit error of sum / total, so that a single tap of value v
// comes back as v rather than v - 1 after truncation. The cost: an average
// that lies within 1e-9 below an integer truncates up to that integer, e.g.
// 99.9999999999 gives 100, not 99.
const TRUNCATION_EPSILON = 1e-9;

function toByte(value: number): number {
  return Math.min(255, Math.max(0, Math.trunc(value + TRUNCATION_EPSILON)));
}
