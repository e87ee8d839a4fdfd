/**
 * Worker thread entry for the parallel blur. The kernel and source raster
 * arrive once through workerData, backed by SharedArrayBuffers, and each job
 * is a single output coordinate.
 */

import { workerData } from 'node:worker_threads';
import { convolvePixel } from './convolve.js';
import type { Kernel, PixelJob, PixelResult, RgbRaster } from './types.js';
import { serveJobs } from './worker-runtime.js';

export interface ConvolveWorkerData {
  kernel: Kernel;
  source: RgbRaster;
}

const { kernel, source }: ConvolveWorkerData = workerData;

serveJobs<PixelJob, PixelResult>(({ x, y }) => ({
  x,
  y,
  pixel: convolvePixel(x, y, kernel, source),
}));
