import { Channel } from './channel.js';
import { convolvePixel } from './convolve.js';
import type { ConvolveWorkerData } from './convolve-worker.js';
import { BlurError } from './errors.js';
import { assertKernelParams, generateKernel, toSharedKernel } from './kernel.js';
import { createProgressTracker, type ProgressTracker } from './progress.js';
import { assertValidRaster, createRaster, setPixel, toSharedRaster } from './raster.js';
import type {
  BlurOptions,
  JobOutcome,
  ParallelBlurOptions,
  PixelJob,
  PixelResult,
  RgbRaster,
} from './types.js';
import { WorkerPool } from './worker-pool.js';

// Sources run the worker straight from TypeScript (tests, tsx); builds from dist/.
const WORKER_SCRIPT = new URL(
  import.meta.url.endsWith('.ts') ? './convolve-worker.ts' : './convolve-worker.js',
  import.meta.url,
);

function validateInputs(radius: number, sigma: number, source: RgbRaster): void {
  assertKernelParams(radius, sigma);
  assertValidRaster(source);
}

/**
 * Blur on the calling thread, one pixel at a time in row-major order.
 * Produces exactly the same bytes as `blurParallel` for the same inputs.
 */
export function blurSequential(
  radius: number,
  sigma: number,
  source: RgbRaster,
  options: BlurOptions = {},
): RgbRaster {
  const { logger = console } = options;
  validateInputs(radius, sigma, source);

  const { width, height } = source;
  logger.log(`Image dimensions: ${width}x${height}`);

  const kernel = generateKernel(radius, sigma);
  const output = createRaster(width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      setPixel(output, x, y, convolvePixel(x, y, kernel, source));
    }
  }
  return output;
}

/**
 * Blur with one job per pixel spread over `workerCount` threads.
 *
 * Resolves once every pixel has been written. If any job fails the whole
 * run rejects with a single `JOB_FAILED` error; a partly blurred raster is
 * never returned. Parameter errors reject before any thread is started.
 */
export async function blurParallel(
  radius: number,
  sigma: number,
  workerCount: number,
  source: RgbRaster,
  options: ParallelBlurOptions = {},
): Promise<RgbRaster> {
  const { logger = console, onProgress, batchSize } = options;
  validateInputs(radius, sigma, source);
  if (!Number.isInteger(workerCount) || workerCount < 1) {
    throw new BlurError(
      `Worker count must be a positive integer, got ${workerCount}`,
      'INVALID_PARAMETER',
    );
  }

  const { width, height } = source;
  const total = width * height;
  const kernel = toSharedKernel(generateKernel(radius, sigma));

  logger.log(`Image dimensions: ${width}x${height}`);
  logger.log(`Number of calculations: ${total * kernel.size * kernel.size}`);

  const workerData: ConvolveWorkerData = { kernel, source: toSharedRaster(source) };
  const output = createRaster(width, height);
  const results = new Channel<JobOutcome<PixelResult>>();
  const tracker = createProgressTracker(total, (percent) => {
    logger.log(`${percent}% done`);
    onProgress?.(percent);
  });

  const pool = WorkerPool.create<PixelJob, PixelResult>({
    workerCount,
    script: WORKER_SCRIPT,
    workerData,
    batchSize,
    logger,
  });

  try {
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        pool.submit({ x, y }, (outcome) => results.send(outcome));
      }
    }
    await collectPixels(results, output, total, tracker);
  } finally {
    await pool.close();
  }

  logger.log('Done!');
  return output;
}

/**
 * Receive exactly `total` outcomes and write each pixel into `output`.
 * Stops on the count, not on channel closure. Failed jobs are tallied and
 * reported together once every outcome is in.
 */
export async function collectPixels(
  results: Channel<JobOutcome<PixelResult>>,
  output: RgbRaster,
  total: number,
  tracker: ProgressTracker,
): Promise<void> {
  let failed = 0;
  let firstError: Error | null = null;

  for (let received = 0; received < total; received++) {
    const outcome = await results.receive();
    if (outcome.ok) {
      const { x, y, pixel } = outcome.result;
      setPixel(output, x, y, pixel);
    } else {
      failed++;
      firstError ??= outcome.error;
    }
    tracker.advance();
  }

  if (firstError) {
    throw new BlurError(
      `${failed} of ${total} pixel jobs failed: ${firstError.message}`,
      'JOB_FAILED',
      firstError,
    );
  }
}
