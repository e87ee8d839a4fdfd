/** 3-channel 8-bit raster, row-major, channels interleaved R,G,B. */
export interface RgbRaster {
  width: number;
  height: number;
  data: Uint8Array;
}

/** One output pixel */
export type Rgb = [r: number, g: number, b: number];

/**
 * Square grid of Gaussian weights, side `2 * radius + 1`.
 * Cell (dx, dy) lives at `(dy + radius) * size + (dx + radius)`.
 * Weights are not normalised to sum to 1 (see convolvePixel).
 */
export interface Kernel {
  radius: number;
  size: number;
  weights: Float64Array;
}

/** Minimal logging surface; `console` satisfies it. */
export type Logger = Pick<Console, 'log' | 'error'>;

export const silentLogger: Logger = {
  log: () => {},
  error: () => {},
};

// --- Parallel path types ---

/** A unit of per-pixel work: just the target coordinate. */
export interface PixelJob {
  x: number;
  y: number;
}

export interface PixelResult {
  x: number;
  y: number;
  pixel: Rgb;
}

/** Exactly one of these is delivered per submitted job. */
export type JobOutcome<TResult> =
  | { ok: true; result: TResult }
  | { ok: false; error: Error };

export interface BlurOptions {
  /** Where progress and summary lines go (default: console) */
  logger?: Logger;
}

export interface ParallelBlurOptions extends BlurOptions {
  /** Called once per 10% milestone reached */
  onProgress?: (percent: number) => void;
  /** Jobs handed to an idle worker per dispatch (default 256) */
  batchSize?: number;
}
