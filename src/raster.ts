import { BlurError } from './errors.js';
import type { Rgb, RgbRaster } from './types.js';

export const CHANNELS = 3;

/**
 * Allocate a zeroed raster. With `shared`, the pixel bytes sit on a
 * SharedArrayBuffer so worker threads can read them without a copy.
 */
export function createRaster(width: number, height: number, shared = false): RgbRaster {
  const byteLength = width * height * CHANNELS;
  const data = shared
    ? new Uint8Array(new SharedArrayBuffer(byteLength))
    : new Uint8Array(byteLength);
  return { width, height, data };
}

/** Check dimensions are positive integers and the buffer matches them. */
export function assertValidRaster(raster: RgbRaster): void {
  const { width, height, data } = raster;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new BlurError(
      `Raster dimensions must be positive integers, got ${width}x${height}`,
      'INVALID_PARAMETER',
    );
  }
  if (data.length !== width * height * CHANNELS) {
    throw new BlurError(
      `Raster buffer holds ${data.length} bytes, expected ${width * height * CHANNELS}`,
      'INVALID_PARAMETER',
    );
  }
}

export function getPixel(raster: RgbRaster, x: number, y: number): Rgb {
  const offset = (y * raster.width + x) * CHANNELS;
  const { data } = raster;
  return [data[offset]!, data[offset + 1]!, data[offset + 2]!];
}

export function setPixel(raster: RgbRaster, x: number, y: number, pixel: Rgb): void {
  const offset = (y * raster.width + x) * CHANNELS;
  raster.data[offset] = pixel[0];
  raster.data[offset + 1] = pixel[1];
  raster.data[offset + 2] = pixel[2];
}

/**
 * Return a raster backed by shared memory. A raster already on a
 * SharedArrayBuffer is returned as-is; anything else is copied once.
 */
export function toSharedRaster(raster: RgbRaster): RgbRaster {
  if (raster.data.buffer instanceof SharedArrayBuffer) return raster;
  const shared = createRaster(raster.width, raster.height, true);
  shared.data.set(raster.data);
  return shared;
}

export function rastersEqual(a: RgbRaster, b: RgbRaster): boolean {
  if (a.width !== b.width || a.height !== b.height) return false;
  if (a.data.length !== b.data.length) return false;
  return Buffer.compare(a.data, b.data) === 0;
}
