/**
 * Fetch with Timeout Utility
 *
 * Wraps native fetch with an AbortController so an upstream call cannot hang.
 * The timer is always cleared in finally.
 */

import { logger } from '../lib/logger/structured-logger.js';

export type FetchErrorKind = 'TIMEOUT' | 'ABORT' | 'DNS_FAIL' | 'NETWORK_ERROR';

export interface FetchWithTimeoutConfig {
  timeoutMs: number;
  provider: string;
  stage?: string;
  traceId?: string | undefined;
  /** Request-scoped abort signal; when aborted, the fetch is cancelled. */
  signal?: AbortSignal | undefined;
}

export class UpstreamFetchError extends Error {
  constructor(
    message: string,
    public readonly errorKind: FetchErrorKind,
    public readonly provider: string,
    public readonly host: string,
    public readonly timeoutMs: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'UpstreamFetchError';
  }
}

function classify(err: unknown, timedOut: boolean, cancelled: boolean): FetchErrorKind {
  if (cancelled) return 'ABORT';
  if (timedOut) return 'TIMEOUT';
  const message = err instanceof Error ? err.message : String(err);
  if (message.includes('ENOTFOUND') || message.includes('getaddrinfo')) return 'DNS_FAIL';
  return 'NETWORK_ERROR';
}

/**
 * Fetch with automatic timeout.
 * Resolves with any HTTP response (status checks are the caller's job);
 * rejects with UpstreamFetchError on timeout, cancellation or transport failure.
 */
export async function fetchWithTimeout(
  url: string,
  options: RequestInit,
  config: FetchWithTimeoutConfig
): Promise<Response> {
  const controller = new AbortController();
  const startTime = Date.now();
  // Log host and path only; query strings may carry user text
  const { host, pathname } = new URL(url);
  let timedOut = false;

  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, config.timeoutMs);

  const onAbort = () => controller.abort();
  if (config.signal?.aborted) {
    controller.abort();
  } else {
    config.signal?.addEventListener('abort', onAbort, { once: true });
  }

  logger.debug({
    method: options.method ?? 'GET',
    host,
    path: pathname,
    timeoutMs: config.timeoutMs,
    provider: config.provider,
    stage: config.stage,
    traceId: config.traceId
  }, '[FETCH] Outbound request');

  try {
    const response = await fetch(url, { ...options, signal: controller.signal });
    logger.debug({
      status: response.status,
      host,
      path: pathname,
      durationMs: Date.now() - startTime,
      traceId: config.traceId
    }, '[FETCH] Response');
    return response;
  } catch (err) {
    const durationMs = Date.now() - startTime;
    const errorKind = classify(err, timedOut, config.signal?.aborted ?? false);

    logger.warn({
      errorKind,
      host,
      durationMs,
      provider: config.provider,
      traceId: config.traceId,
      error: err instanceof Error ? err.message : String(err)
    }, '[FETCH] Upstream call failed');

    throw new UpstreamFetchError(
      `${config.provider} ${errorKind.toLowerCase().replace('_', ' ')} after ${durationMs}ms`,
      errorKind,
      config.provider,
      host,
      config.timeoutMs,
      { cause: err }
    );
  } finally {
    clearTimeout(timeoutId);
    config.signal?.removeEventListener('abort', onAbort);
  }
}
