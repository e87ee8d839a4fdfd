import { BlurError } from './errors.js';
import type { Kernel } from './types.js';

/** Radii travel as an unsigned byte on the command line and in config. */
export const MAX_RADIUS = 255;

/** Isotropic 2-D Gaussian density at offset (dx, dy). */
export function gaussian(dx: number, dy: number, sigma: number): number {
  const variance = sigma * sigma;
  return Math.exp(-(dx * dx + dy * dy) / (2 * variance)) / (2 * Math.PI * variance);
}

export function assertKernelParams(radius: number, sigma: number): void {
  if (!Number.isInteger(radius) || radius < 0 || radius > MAX_RADIUS) {
    throw new BlurError(
      `Radius must be an integer in [0, ${MAX_RADIUS}], got ${radius}`,
      'INVALID_PARAMETER',
    );
  }
  if (!Number.isFinite(sigma) || sigma <= 0) {
    throw new BlurError(`Sigma must be a positive number, got ${sigma}`, 'INVALID_PARAMETER');
  }
}

/**
 * Build the full (2r+1)x(2r+1) kernel. The weights are left unnormalised;
 * convolvePixel divides by the sum of the taps it actually uses.
 */
export function generateKernel(radius: number, sigma: number): Kernel {
  assertKernelParams(radius, sigma);

  const size = radius * 2 + 1;
  const weights = new Float64Array(size * size);
  for (let dy = -radius; dy <= radius; dy++) {
    for (let dx = -radius; dx <= radius; dx++) {
      weights[(dy + radius) * size + (dx + radius)] = gaussian(dx, dy, sigma);
    }
  }

  return { radius, size, weights };
}

/** Weight at signed offset (dx, dy) from the kernel centre. */
export function kernelWeight(kernel: Kernel, dx: number, dy: number): number {
  return kernel.weights[(dy + kernel.radius) * kernel.size + (dx + kernel.radius)]!;
}

/** Copy the weights onto a SharedArrayBuffer for hand-off to worker threads. */
export function toSharedKernel(kernel: Kernel): Kernel {
  if (kernel.weights.buffer instanceof SharedArrayBuffer) return kernel;
  const weights = new Float64Array(new SharedArrayBuffer(kernel.weights.byteLength));
  weights.set(kernel.weights);
  return { radius: kernel.radius, size: kernel.size, weights };
}
