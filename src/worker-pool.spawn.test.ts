import type { Worker } from 'node:worker_threads';
import { describe, it, expect, vi } from 'vitest';
import { WorkerPool } from './worker-pool.js';

const spawns = vi.hoisted(() => {
  const started: Worker[] = [];
  return { remaining: Number.POSITIVE_INFINITY, started };
});

// Lets a test make the Nth thread fail to start.
vi.mock('node:worker_threads', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:worker_threads')>();

  class LimitedWorker extends actual.Worker {
    constructor(...args: ConstructorParameters<typeof actual.Worker>) {
      if (spawns.remaining <= 0) throw new Error('spawn refused');
      spawns.remaining--;
      super(...args);
      spawns.started.push(this);
    }
  }

  return { ...actual, Worker: LimitedWorker };
});

const FIXTURE = new URL('./__fixtures__/arithmetic-worker.ts', import.meta.url);

describe('WorkerPool.create', () => {
  it('terminates the threads it already started when a later spawn fails', async () => {
    spawns.remaining = 2;
    const logger = { log: vi.fn(), error: vi.fn() };

    expect(() =>
      WorkerPool.create({ workerCount: 4, script: FIXTURE, workerData: { offset: 0 }, logger }),
    ).toThrow('spawn refused');
    expect(spawns.started).toHaveLength(2);

    const exitCodes = await Promise.all(
      spawns.started.map((worker) => new Promise<number>((resolve) => worker.once('exit', resolve))),
    );
    expect(exitCodes).toEqual([1, 1]);
    expect(logger.error).not.toHaveBeenCalled();
  });
});
