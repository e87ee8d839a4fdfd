import sharp from 'sharp';
import { BlurError, toError } from './errors.js';
import { CHANNELS, assertValidRaster } from './raster.js';
import type { RgbRaster } from './types.js';

/**
 * Decode an image file into an 8-bit RGB raster.
 * Alpha is flattened onto black and greyscale is expanded to sRGB.
 */
export async function loadRgbImage(filePath: string): Promise<RgbRaster> {
  let decoded: { data: Buffer; info: sharp.OutputInfo };
  try {
    decoded = await sharp(filePath)
      .flatten()
      .toColourspace('srgb')
      .raw()
      .toBuffer({ resolveWithObject: true });
  } catch (error) {
    throw new BlurError(`Failed to read image ${filePath}`, 'IMAGE_IO', toError(error));
  }

  const { data, info } = decoded;
  if (info.channels !== CHANNELS) {
    throw new BlurError(
      `Expected ${CHANNELS} channels after decoding ${filePath}, got ${info.channels}`,
      'IMAGE_IO',
    );
  }

  return {
    width: info.width,
    height: info.height,
    data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength),
  };
}

/** Encode a raster; the format follows the file extension. */
export async function saveRgbImage(raster: RgbRaster, filePath: string): Promise<void> {
  assertValidRaster(raster);
  try {
    await sharp(Buffer.from(raster.data), {
      raw: { width: raster.width, height: raster.height, channels: CHANNELS },
    }).toFile(filePath);
  } catch (error) {
    throw new BlurError(`Failed to write image ${filePath}`, 'IMAGE_IO', toError(error));
  }
}
