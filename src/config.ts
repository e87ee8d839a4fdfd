import { config as loadDotenv } from 'dotenv';
import { BlurError } from './errors.js';
import { MAX_RADIUS } from './kernel.js';
import { DEFAULT_BATCH_SIZE } from './worker-pool.js';

export interface BlurConfig {
  radius: number;
  sigma: number;
  threads: number;
  batchSize: number;
}

export const DEFAULT_CONFIG: BlurConfig = {
  radius: 10,
  sigma: 10,
  threads: 10,
  batchSize: DEFAULT_BATCH_SIZE,
};

/** Merge a `.env` file (if present) into process.env. Existing variables win. */
export function loadEnvFile(filePath: string): void {
  loadDotenv({ path: filePath });
}

/**
 * Read blur defaults from the environment:
 * BLUR_RADIUS, BLUR_SIGMA, BLUR_THREADS, BLUR_BATCH_SIZE.
 */
export function loadBlurConfig(env: NodeJS.ProcessEnv = process.env): BlurConfig {
  return {
    radius: readInteger(env, 'BLUR_RADIUS', DEFAULT_CONFIG.radius, 0, MAX_RADIUS),
    sigma: readPositiveNumber(env, 'BLUR_SIGMA', DEFAULT_CONFIG.sigma),
    threads: readInteger(env, 'BLUR_THREADS', DEFAULT_CONFIG.threads, 1),
    batchSize: readInteger(env, 'BLUR_BATCH_SIZE', DEFAULT_CONFIG.batchSize, 1),
  };
}

function readInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new BlurError(
      `${name} must be an integer in [${min}, ${max}], got "${raw}"`,
      'INVALID_PARAMETER',
    );
  }
  return value;
}

function readPositiveNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new BlurError(`${name} must be a positive number, got "${raw}"`, 'INVALID_PARAMETER');
  }
  return value;
}
