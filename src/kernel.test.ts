import { describe, it, expect } from 'vitest';
import { BlurError } from './errors.js';
import { gaussian, generateKernel, kernelWeight, toSharedKernel } from './kernel.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('gaussian', () => {
  it('peaks at 1 / (2 pi sigma^2) at the origin', () => {
    expect(gaussian(0, 0, 1)).toBeCloseTo(1 / (2 * Math.PI), 15);
    expect(gaussian(0, 0, 2)).toBeCloseTo(1 / (8 * Math.PI), 15);
  });

  it('falls off with squared distance', () => {
    expect(gaussian(1, 0, 1) / gaussian(0, 0, 1)).toBeCloseTo(Math.exp(-0.5), 15);
    expect(gaussian(1, 1, 1) / gaussian(0, 0, 1)).toBeCloseTo(Math.exp(-1), 15);
  });
});

describe('generateKernel', () => {
  it('builds a 1x1 kernel for radius 0', () => {
    const kernel = generateKernel(0, 2);

    expect(kernel.size).toBe(1);
    expect(kernel.weights).toHaveLength(1);
    expect(kernel.weights[0]).toBe(gaussian(0, 0, 2));
  });

  it('has side 2r+1 and one Gaussian weight per offset', () => {
    const kernel = generateKernel(2, 1.5);

    expect(kernel.size).toBe(5);
    expect(kernel.weights).toHaveLength(25);
    for (let dy = -2; dy <= 2; dy++) {
      for (let dx = -2; dx <= 2; dx++) {
        expect(kernelWeight(kernel, dx, dy)).toBe(gaussian(dx, dy, 1.5));
      }
    }
  });

  it('is symmetric under sign flips of either offset', () => {
    const kernel = generateKernel(4, 2.5);

    for (let dy = -4; dy <= 4; dy++) {
      for (let dx = -4; dx <= 4; dx++) {
        const w = kernelWeight(kernel, dx, dy);
        expect(kernelWeight(kernel, -dx, dy)).toBe(w);
        expect(kernelWeight(kernel, dx, -dy)).toBe(w);
        expect(kernelWeight(kernel, dy, dx)).toBe(w);
      }
    }
  });

  it('is not normalised to sum to one', () => {
    const kernel = generateKernel(1, 1);
    const sum = kernel.weights.reduce((acc, w) => acc + w, 0);

    expect(sum).toBeLessThan(1);
    expect(sum).toBeGreaterThan(0);
  });

  it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])('rejects sigma %s', (sigma) => {
    const error = captureError(() => generateKernel(1, sigma));

    expect(error).toBeInstanceOf(BlurError);
    expect(error).toMatchObject({ code: 'INVALID_PARAMETER' });
  });

  it.each([-1, 1.5, 256])('rejects radius %s', (radius) => {
    const error = captureError(() => generateKernel(radius, 1));

    expect(error).toBeInstanceOf(BlurError);
    expect(error).toMatchObject({ code: 'INVALID_PARAMETER' });
  });
});

describe('toSharedKernel', () => {
  it('copies weights onto shared memory once', () => {
    const kernel = generateKernel(1, 1);
    const shared = toSharedKernel(kernel);

    expect(shared.weights.buffer).toBeInstanceOf(SharedArrayBuffer);
    expect(Array.from(shared.weights)).toEqual(Array.from(kernel.weights));
    expect(toSharedKernel(shared)).toBe(shared);
  });
});
