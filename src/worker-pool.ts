/**
 * WorkerPool - fixed set of long-lived worker threads fed from one intake.
 *
 * Jobs are plain data (they must survive structured clone). Each worker runs
 * the same script, which registers its job handler with `serveJobs()`.
 * Large read-only inputs go in `workerData` once, ideally on shared memory,
 * instead of travelling with every job.
 *
 * @example
 * ```ts
 * const pool = WorkerPool.create<PixelJob, PixelResult>({
 *   workerCount: 4,
 *   script: new URL('./convolve-worker.js', import.meta.url),
 *   workerData: { source, kernel },
 * })
 * pool.submit({ x: 0, y: 0 }, (outcome) => results.send(outcome))
 * await pool.close()
 * ```
 */

import { Worker } from 'node:worker_threads';
import { Fifo } from './channel.js';
import { BlurError, PoolError } from './errors.js';
import type { JobOutcome, Logger } from './types.js';
import type { BatchReply, PoolRequest } from './worker-runtime.js';

export const DEFAULT_BATCH_SIZE = 256;

export interface WorkerPoolOptions {
  /** Number of threads, fixed for the pool's lifetime */
  workerCount: number;
  /** Worker entry point (.js, or .ts when running from sources) */
  script: URL;
  /** Passed to every worker unchanged */
  workerData?: unknown;
  /** Upper bound on jobs handed to an idle worker at once */
  batchSize?: number;
  logger?: Logger;
}

export type PoolState = 'open' | 'closing' | 'closed' | 'failed';

type Reply<TResult> = (outcome: JobOutcome<TResult>) => void;

interface QueuedJob<TJob, TResult> {
  job: TJob;
  reply: Reply<TResult>;
}

interface PoolWorker<TJob, TResult> {
  id: number;
  worker: Worker;
  /** Batch currently running on this worker; null while idle */
  inFlight: QueuedJob<TJob, TResult>[] | null;
  shuttingDown: boolean;
  alive: boolean;
  exited: Promise<void>;
}

const TS_WORKER_ENTRY = new URL('./ts-worker.mjs', import.meta.url);

/**
 * Start a worker on `script`. A TypeScript source (tests, tsx runs) goes
 * through the tsx bootstrap, which receives the script's URL in argv.
 */
function startWorker(script: URL, workerData: unknown): Worker {
  if (script.pathname.endsWith('.ts')) {
    return new Worker(TS_WORKER_ENTRY, { workerData, argv: [script.href] });
  }
  return new Worker(script, { workerData });
}

export class WorkerPool<TJob, TResult> {
  private workers: PoolWorker<TJob, TResult>[] = [];
  private intake = new Fifo<QueuedJob<TJob, TResult>>();
  private _state: PoolState = 'open';
  private closing: Promise<void> | null = null;
  private fatal: PoolError | null = null;
  private drainWaiters: Array<() => void> = [];
  private dispatchScheduled = false;

  private constructor(
    private readonly batchSize: number,
    private readonly logger: Logger,
  ) {}

  /**
   * Spawn `workerCount` threads. Throws `INVALID_PARAMETER` for a worker
   * count or batch size that is not a positive integer.
   */
  static create<TJob, TResult>(options: WorkerPoolOptions): WorkerPool<TJob, TResult> {
    const { workerCount, batchSize = DEFAULT_BATCH_SIZE, logger = console } = options;

    if (!Number.isInteger(workerCount) || workerCount < 1) {
      throw new BlurError(
        `Worker count must be a positive integer, got ${workerCount}`,
        'INVALID_PARAMETER',
      );
    }
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new BlurError(
        `Batch size must be a positive integer, got ${batchSize}`,
        'INVALID_PARAMETER',
      );
    }

    const pool = new WorkerPool<TJob, TResult>(batchSize, logger);
    try {
      for (let id = 0; id < workerCount; id++) {
        pool.workers.push(pool.spawn(id, options.script, options.workerData));
      }
    } catch (error) {
      pool.abandon();
      throw error;
    }
    return pool;
  }

  get state(): PoolState {
    return this._state;
  }

  /** Number of worker threads that have not exited. */
  get size(): number {
    return this.workers.filter((entry) => entry.alive).length;
  }

  /** Jobs queued or running. */
  get pending(): number {
    let running = 0;
    for (const entry of this.workers) running += entry.inFlight?.length ?? 0;
    return this.intake.length + running;
  }

  /**
   * Queue a job and return immediately. `reply` is called exactly once
   * with the job's outcome.
   */
  submit(job: TJob, reply: Reply<TResult>): void {
    if (this._state !== 'open') {
      throw new PoolError(`Cannot submit to a ${this._state} pool`, 'POOL_CLOSED');
    }
    this.intake.push({ job, reply });
    this.scheduleDispatch();
  }

  /**
   * Close the intake, let every queued job finish, then stop each worker and
   * wait for it to exit. Rejects with the crash error if a worker died.
   */
  close(): Promise<void> {
    if (this.closing) return this.closing;
    if (this._state === 'open') this._state = 'closing';
    this.closing = this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    await this.whenDrained();

    if (!this.fatal) {
      const request: PoolRequest<TJob> = { type: 'shutdown' };
      for (const entry of this.workers) {
        entry.shuttingDown = true;
        entry.worker.postMessage(request);
      }
    }
    await Promise.all(this.workers.map((entry) => entry.exited));

    if (this.fatal) throw this.fatal;
    this._state = 'closed';
  }

  private spawn(id: number, script: URL, workerData: unknown): PoolWorker<TJob, TResult> {
    const worker = startWorker(script, workerData);
    const entry: PoolWorker<TJob, TResult> = {
      id,
      worker,
      inFlight: null,
      shuttingDown: false,
      alive: true,
      exited: Promise.resolve(),
    };

    worker.on('message', (message: BatchReply<TResult>) => this.handleReply(entry, message));
    worker.on('error', (error) => this.fail(entry, error));
    entry.exited = new Promise<void>((resolve) => {
      worker.once('exit', (code) => {
        entry.alive = false;
        if (!entry.shuttingDown) {
          this.fail(entry, new Error(`exited unexpectedly with code ${code}`));
        }
        resolve();
      });
    });

    return entry;
  }

  /** Stop the threads spawned so far when `create` cannot finish. */
  private abandon(): void {
    this._state = 'failed';
    for (const entry of this.workers) {
      entry.shuttingDown = true;
      entry.worker.terminate().catch((error: unknown) => {
        this.logger.error(`[pool] Failed to terminate worker ${entry.id}:`, error);
      });
    }
  }

  private scheduleDispatch(): void {
    if (this.dispatchScheduled) return;
    this.dispatchScheduled = true;
    // Deferred so a burst of synchronous submits is split into full batches.
    queueMicrotask(() => {
      this.dispatchScheduled = false;
      this.dispatch();
    });
  }

  /** Hand each idle worker its share of the intake. */
  private dispatch(): void {
    if (this.fatal) return;

    const idle = this.workers.filter((entry) => entry.inFlight === null && !entry.shuttingDown);
    for (let i = 0; i < idle.length && this.intake.length > 0; i++) {
      const entry = idle[i]!;
      const share = Math.min(this.batchSize, Math.ceil(this.intake.length / (idle.length - i)));
      const batch: QueuedJob<TJob, TResult>[] = [];
      while (batch.length < share) {
        const next = this.intake.shift();
        if (next === undefined) break;
        batch.push(next);
      }

      entry.inFlight = batch;
      const request: PoolRequest<TJob> = { type: 'batch', jobs: batch.map((queued) => queued.job) };
      entry.worker.postMessage(request);
    }
  }

  private handleReply(entry: PoolWorker<TJob, TResult>, message: BatchReply<TResult>): void {
    const batch = entry.inFlight;
    if (batch === null) return;
    entry.inFlight = null;

    batch.forEach((queued, i) => {
      const outcome = message.outcomes[i];
      if (outcome === undefined) {
        queued.reply({ ok: false, error: new Error(`Worker ${entry.id} returned no outcome`) });
      } else if (outcome.ok) {
        queued.reply({ ok: true, result: outcome.result });
      } else {
        this.logger.error(`[pool] Job failed on worker ${entry.id}: ${outcome.message}`);
        queued.reply({ ok: false, error: new Error(outcome.message) });
      }
    });

    this.dispatch();
    this.notifyIfDrained();
  }

  /**
   * A dead worker breaks the fixed pool size, so the whole pool goes down:
   * every outstanding job is answered with the crash error and the other
   * workers are terminated.
   */
  private fail(entry: PoolWorker<TJob, TResult>, cause: Error): void {
    if (this.fatal) return;

    this.fatal = new PoolError(`Worker ${entry.id} crashed: ${cause.message}`, 'WORKER_CRASHED', cause);
    this._state = 'failed';
    this.logger.error(`[pool] ${this.fatal.message}`);

    const orphaned: QueuedJob<TJob, TResult>[] = [];
    for (const other of this.workers) {
      if (other.inFlight) orphaned.push(...other.inFlight);
      other.inFlight = null;
      other.shuttingDown = true;
      if (other !== entry) {
        other.worker.terminate().catch((error: unknown) => {
          this.logger.error(`[pool] Failed to terminate worker ${other.id}:`, error);
        });
      }
    }
    orphaned.push(...this.intake.drain());

    const fatal = this.fatal;
    for (const queued of orphaned) queued.reply({ ok: false, error: fatal });
    this.notifyIfDrained();
  }

  private whenDrained(): Promise<void> {
    return new Promise((resolve) => {
      this.drainWaiters.push(resolve);
      this.notifyIfDrained();
    });
  }

  private notifyIfDrained(): void {
    if (this.pending > 0 && !this.fatal) return;
    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
