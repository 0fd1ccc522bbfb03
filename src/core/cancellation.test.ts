import { describe, it, expect } from 'vitest';
import { CancelledError, isCancellationError, throwIfCancelled, waitAtMost } from './cancellation.js';

describe('isCancellationError', () => {
  it('recognizes CancelledError and AbortError', () => {
    const abortError = Object.assign(new Error('aborted'), { name: 'AbortError' });

    expect(isCancellationError(new CancelledError())).toBe(true);
    expect(isCancellationError(abortError)).toBe(true);
    expect(isCancellationError(new Error('boom'))).toBe(false);
  });

  it("treats an aborted signal's reason as cancellation", () => {
    const controller = new AbortController();
    const reason = new Error('shutting down');
    controller.abort(reason);

    expect(isCancellationError(reason, controller.signal)).toBe(true);
    expect(isCancellationError(new Error('other'), controller.signal)).toBe(false);
  });
});

describe('throwIfCancelled', () => {
  it('throws only once the signal aborted', () => {
    const controller = new AbortController();

    expect(() => throwIfCancelled(controller.signal)).not.toThrow();
    controller.abort();
    expect(() => throwIfCancelled(controller.signal)).toThrow(CancelledError);
  });
});

describe('waitAtMost', () => {
  it('returns the value when the promise settles in time', async () => {
    await expect(waitAtMost(Promise.resolve('done'), 50)).resolves.toEqual({ timedOut: false, value: 'done' });
  });

  it('reports a timeout when the promise is too slow', async () => {
    const slow = new Promise<string>(() => undefined);

    await expect(waitAtMost(slow, 5)).resolves.toEqual({ timedOut: true });
  });

  it('propagates a rejection', async () => {
    await expect(waitAtMost(Promise.reject(new Error('broken')), 50)).rejects.toThrow('broken');
  });
});
