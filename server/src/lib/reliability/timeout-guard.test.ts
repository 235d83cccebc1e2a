import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { CancelledError, TimeoutError, isTimeoutError, withTimeout } from './timeout-guard.js';

describe('withTimeout', () => {
  it('resolves with the value when it settles in time', async () => {
    const value = await withTimeout(Promise.resolve('ok'), 100, 'op');
    assert.equal(value, 'ok');
  });

  it('rejects with TimeoutError and calls onTimeout', async () => {
    let timedOut = false;
    const never = new Promise<string>(() => undefined);

    await assert.rejects(
      withTimeout(never, 10, 'slow_op', () => { timedOut = true; }),
      (err: unknown) => err instanceof TimeoutError && err.operation === 'slow_op' && err.timeoutMs === 10
    );
    assert.equal(timedOut, true);
  });

  it('passes the rejection through unchanged', async () => {
    await assert.rejects(withTimeout(Promise.reject(new Error('inner')), 100, 'op'), /inner/);
  });

  it('rejects with CancelledError when the signal aborts', async () => {
    const controller = new AbortController();
    const never = new Promise<string>(() => undefined);
    const pending = withTimeout(never, 1_000, 'op', undefined, controller.signal);

    controller.abort();

    await assert.rejects(pending, (err: unknown) => err instanceof CancelledError);
  });

  it('rejects immediately for an already-aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await assert.rejects(
      withTimeout(Promise.resolve('late'), 1_000, 'op', undefined, controller.signal),
      (err: unknown) => err instanceof CancelledError
    );
  });

  it('isTimeoutError narrows only timeouts', () => {
    assert.equal(isTimeoutError(new TimeoutError('op', 1)), true);
    assert.equal(isTimeoutError(new Error('op')), false);
  });
});
