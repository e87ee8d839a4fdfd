/**
 * WorkerPool tests run real worker threads on a small fixture script.
 */

import { describe, it, expect, vi } from 'vitest';
import type { ArithmeticJob, ArithmeticResult } from './__fixtures__/arithmetic-worker.js';
import { BlurError, PoolError } from './errors.js';
import type { JobOutcome, Logger } from './types.js';
import { WorkerPool } from './worker-pool.js';

const FIXTURE = new URL('./__fixtures__/arithmetic-worker.ts', import.meta.url);

function quietLogger(): Logger & { error: ReturnType<typeof vi.fn> } {
  return { log: vi.fn(), error: vi.fn() };
}

function createPool(workerCount: number, logger: Logger = quietLogger(), batchSize?: number) {
  return WorkerPool.create<ArithmeticJob, ArithmeticResult>({
    workerCount,
    script: FIXTURE,
    workerData: { offset: 1 },
    batchSize,
    logger,
  });
}

describe('WorkerPool', () => {
  it('spawns exactly the requested number of workers', async () => {
    const pool = createPool(3);

    expect(pool.size).toBe(3);
    expect(pool.state).toBe('open');

    await pool.close();
    expect(pool.size).toBe(0);
    expect(pool.state).toBe('closed');
  });

  it('rejects a worker count below one before spawning anything', () => {
    expect(() => createPool(0)).toThrow(BlurError);
    expect(() => createPool(1.5)).toThrow('positive integer');
  });

  it('answers every job once and finishes them all before close resolves', async () => {
    const pool = createPool(3);
    const outcomes = new Map<number, JobOutcome<ArithmeticResult>>();

    for (let n = 0; n < 50; n++) {
      pool.submit({ n }, (outcome) => {
        expect(outcomes.has(n)).toBe(false);
        outcomes.set(n, outcome);
      });
    }
    expect(pool.pending).toBe(50);

    await pool.close();

    expect(outcomes.size).toBe(50);
    expect(pool.pending).toBe(0);
    for (let n = 0; n < 50; n++) {
      expect(outcomes.get(n)).toEqual({
        ok: true,
        result: { value: n * n + 1, threadId: expect.any(Number) },
      });
    }
  });

  it('spreads a burst of jobs over every idle worker', async () => {
    const pool = createPool(4, quietLogger(), 10);
    const threads: number[] = [];

    for (let n = 0; n < 400; n++) {
      pool.submit({ n }, (outcome) => {
        if (outcome.ok) threads.push(outcome.result.threadId);
      });
    }
    await pool.close();

    expect(threads).toHaveLength(400);
    expect(new Set(threads).size).toBe(4);
  });

  it('refuses new jobs once closing has started', async () => {
    const pool = createPool(1);
    const closed = pool.close();

    expect(() => pool.submit({ n: 1 }, () => {})).toThrow(PoolError);
    expect(pool.close()).toBe(closed);
    await closed;

    let error: unknown;
    try {
      pool.submit({ n: 2 }, () => {});
    } catch (caught) {
      error = caught;
    }
    expect(error).toMatchObject({ code: 'POOL_CLOSED' });
  });

  it('contains a failing job: logs it, reports it, and keeps the worker serving', async () => {
    const logger = quietLogger();
    const pool = createPool(2, logger);
    const outcomes: Array<JobOutcome<ArithmeticResult>> = [];
    const record = (outcome: JobOutcome<ArithmeticResult>) => outcomes.push(outcome);

    pool.submit({ n: 2 }, record);
    pool.submit({ n: 3, mode: 'throw' }, record);
    pool.submit({ n: 4 }, record);
    await vi.waitFor(() => expect(outcomes).toHaveLength(3));

    const messages = outcomes.flatMap((outcome) => (outcome.ok ? [] : [outcome.error.message]));
    expect(messages).toEqual(['job 3 rejected']);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(expect.stringContaining('job 3 rejected'));

    expect(pool.size).toBe(2);
    pool.submit({ n: 5 }, record);
    await pool.close();

    expect(outcomes).toHaveLength(4);
    expect(outcomes[3]).toEqual({ ok: true, result: { value: 26, threadId: expect.any(Number) } });
  });

  it('fails every outstanding job and rejects close when a worker dies', async () => {
    const logger = quietLogger();
    const pool = createPool(1, logger);
    const outcomes: Array<JobOutcome<ArithmeticResult>> = [];
    const record = (outcome: JobOutcome<ArithmeticResult>) => outcomes.push(outcome);

    pool.submit({ n: 1 }, record);
    pool.submit({ n: 2, mode: 'crash' }, record);
    pool.submit({ n: 3 }, record);

    await expect(pool.close()).rejects.toMatchObject({ code: 'WORKER_CRASHED' });

    expect(pool.state).toBe('failed');
    expect(pool.size).toBe(0);
    expect(outcomes).toHaveLength(3);
    for (const outcome of outcomes) {
      expect(outcome.ok).toBe(false);
      if (!outcome.ok) expect(outcome.error).toBeInstanceOf(PoolError);
    }
    expect(logger.error).toHaveBeenCalledWith(expect.stringContaining('exited unexpectedly with code 3'));
  });
});
