/**
 * Worker-side half of the pool protocol. A worker script calls
 * `serveJobs(handler)` once; the pool hands it batches of jobs and the
 * worker answers each batch with one outcome per job, in order.
 */

import { parentPort } from 'node:worker_threads';
import { toError } from './errors.js';

export interface BatchRequest<TJob> {
  type: 'batch';
  jobs: TJob[];
}

export interface ShutdownRequest {
  type: 'shutdown';
}

export type PoolRequest<TJob> = BatchRequest<TJob> | ShutdownRequest;

/** Errors cross the thread boundary as their message only. */
export type WireOutcome<TResult> =
  | { ok: true; result: TResult }
  | { ok: false; message: string };

export interface BatchReply<TResult> {
  type: 'results';
  outcomes: WireOutcome<TResult>[];
}

export function serveJobs<TJob, TResult>(handler: (job: TJob) => TResult): void {
  const port = parentPort;
  if (!port) {
    throw new Error('serveJobs() must be called from a worker thread');
  }

  port.on('message', (message: PoolRequest<TJob>) => {
    if (message.type === 'shutdown') {
      // Nothing else holds the event loop open, so the thread exits.
      port.close();
      return;
    }

    const outcomes = message.jobs.map((job) => runJob(handler, job));
    const reply: BatchReply<TResult> = { type: 'results', outcomes };
    port.postMessage(reply);
  });
}

function runJob<TJob, TResult>(handler: (job: TJob) => TResult, job: TJob): WireOutcome<TResult> {
  try {
    return { ok: true, result: handler(job) };
  } catch (error) {
    return { ok: false, message: toError(error).message };
  }
}
