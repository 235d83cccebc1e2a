/**
 * Retry Handler
 * Re-runs an operation with backoff while the caller says the error is retriable
 */

import { logger } from '../logger/structured-logger.js';
import { sleep } from './timeout-guard.js';

export interface RetryConfig {
  /** Total attempts, including the first */
  maxAttempts: number;
  /** Delay before attempt i (index 0 is ignored) */
  backoffMs: number[];
}

export interface RetryOptions {
  operation: string;
  traceId?: string | undefined;
  isRetriable: (error: unknown) => boolean;
  onError?: ((attempt: number, error: unknown, willRetry: boolean) => void) | undefined;
  signal?: AbortSignal | undefined;
}

export class RetryHandler {
  constructor(private readonly config: RetryConfig) {}

  async executeWithRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
    const { maxAttempts, backoffMs } = this.config;

    for (let attempt = 0; ; attempt++) {
      const backoff = backoffMs[attempt] ?? 0;
      if (attempt > 0 && backoff > 0) {
        await sleep(backoff);
      }

      try {
        return await fn(attempt);
      } catch (e) {
        const exhausted = attempt >= maxAttempts - 1;
        const willRetry = !exhausted && opts.isRetriable(e) && !opts.signal?.aborted;
        opts.onError?.(attempt, e, willRetry);

        if (!willRetry) {
          if (exhausted && maxAttempts > 1) {
            logger.warn({
              operation: opts.operation,
              attempts: attempt + 1,
              traceId: opts.traceId
            }, '[Retry] All attempts exhausted');
          }
          throw e;
        }

        logger.warn({
          operation: opts.operation,
          attempt: attempt + 1,
          maxAttempts,
          traceId: opts.traceId,
          error: e instanceof Error ? e.name : String(e)
        }, '[Retry] Retriable error, trying again');
      }
    }
  }
}
