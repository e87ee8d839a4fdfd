export type BlurErrorCode =
  | 'INVALID_PARAMETER'
  | 'INVALID_ARGUMENT'
  | 'JOB_FAILED'
  | 'IMAGE_IO';

/** Raised by the blur entry points, the CLI option parser and image I/O. */
export class BlurError extends Error {
  override readonly name = 'BlurError';

  constructor(
    message: string,
    public readonly code: BlurErrorCode,
    override readonly cause?: Error,
  ) {
    super(message, { cause });
  }
}

export type PoolErrorCode = 'POOL_CLOSED' | 'WORKER_CRASHED';

export class PoolError extends Error {
  override readonly name = 'PoolError';

  constructor(
    message: string,
    public readonly code: PoolErrorCode,
    override readonly cause?: Error,
  ) {
    super(message, { cause });
  }
}

export class ChannelError extends Error {
  override readonly name = 'ChannelError';
  readonly code = 'CHANNEL_CLOSED';

  constructor(message: string) {
    super(message);
  }
}

/** Normalise an unknown thrown value into an Error. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
