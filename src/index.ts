export { blurParallel, blurSequential, collectPixels } from './blur.js';
export { Channel, Fifo } from './channel.js';
export { convolvePixel } from './convolve.js';
export { loadBlurConfig, loadEnvFile, DEFAULT_CONFIG, type BlurConfig } from './config.js';
export {
  BlurError,
  ChannelError,
  PoolError,
  type BlurErrorCode,
  type PoolErrorCode,
} from './errors.js';
export { loadRgbImage, saveRgbImage } from './image-io.js';
export { gaussian, generateKernel, kernelWeight, MAX_RADIUS } from './kernel.js';
export { defaultOutputPath, parseBlurArgs, usageText, type BlurCommand, type ParsedArgs } from './options.js';
export { createProgressTracker, type ProgressTracker } from './progress.js';
export {
  assertValidRaster,
  createRaster,
  getPixel,
  rastersEqual,
  setPixel,
  toSharedRaster,
} from './raster.js';
export { silentLogger } from './types.js';
export type {
  BlurOptions,
  JobOutcome,
  Kernel,
  Logger,
  ParallelBlurOptions,
  PixelJob,
  PixelResult,
  Rgb,
  RgbRaster,
} from './types.js';
export { WorkerPool, DEFAULT_BATCH_SIZE, type PoolState, type WorkerPoolOptions } from './worker-pool.js';
export { serveJobs } from './worker-runtime.js';
