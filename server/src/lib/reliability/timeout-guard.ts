/**
 * Timeout Guard
 *
 * Wraps promises with timeout protection so a slow collaborator
 * cannot hang a conversation turn.
 */

export class TimeoutError extends Error {
  constructor(
    public operation: string,
    public timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class CancelledError extends Error {
  constructor(public operation: string) {
    super(`${operation} was cancelled`);
    this.name = 'CancelledError';
  }
}

/**
 * Wrap a promise with a timeout and an optional caller abort signal.
 *
 * Rejects with TimeoutError when timeoutMs elapses (calling onTimeout first),
 * or with CancelledError when `signal` aborts before the promise settles.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
  onTimeout?: () => void,
  signal?: AbortSignal
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError(operation));
      return;
    }

    const onAbort = () => {
      cleanup();
      reject(new CancelledError(operation));
    };

    const timeoutId = setTimeout(() => {
      cleanup();
      onTimeout?.();
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);

    const cleanup = () => {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    };

    signal?.addEventListener('abort', onAbort, { once: true });

    promise.then(
      value => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      }
    );
  });
}

export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
