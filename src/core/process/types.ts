/**
 * The hook program could not be started, or its stdin pipe is missing
 */
export class SpawnFailureError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'SpawnFailureError';
  }
}

/**
 * The child reported an error after it was spawned
 */
export class ProcessWaitError extends Error {
  constructor(
    message: string,
    public readonly pid: number | undefined,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'ProcessWaitError';
  }
}

/**
 * Error codes that mean the reading end of a pipe is gone
 *
 * `EPIPE` comes from the kernel. `ERR_STREAM_DESTROYED` is what Node reports
 * once it has torn the stdin stream down after the child exited.
 */
const BROKEN_PIPE_CODES = new Set(['EPIPE', 'ERR_STREAM_DESTROYED']);

/**
 * Checked by shape, since errors raised in another realm fail `instanceof`
 */
export function isErrorLike(value: unknown): value is Error {
  return (
    typeof value === 'object' &&
    value !== null &&
    'message' in value &&
    typeof value.message === 'string' &&
    'name' in value &&
    typeof value.name === 'string'
  );
}

export function isBrokenPipe(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string' &&
    BROKEN_PIPE_CODES.has(error.code)
  );
}

export function toError(error: unknown): Error {
  return isErrorLike(error) ? error : new Error(String(error));
}
