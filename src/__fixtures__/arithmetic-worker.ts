/** Worker used by the pool tests. */

import { threadId, workerData } from 'node:worker_threads';
import { serveJobs } from '../worker-runtime.js';

export interface ArithmeticJob {
  n: number;
  /** 'throw' fails the job, 'crash' kills the thread */
  mode?: 'throw' | 'crash';
}

export interface ArithmeticResult {
  value: number;
  threadId: number;
}

const { offset }: { offset: number } = workerData;

serveJobs<ArithmeticJob, ArithmeticResult>(({ n, mode }) => {
  if (mode === 'throw') throw new Error(`job ${n} rejected`);
  if (mode === 'crash') process.exit(3);
  return { value: n * n + offset, threadId };
});
