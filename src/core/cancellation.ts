/**
 * Cooperative cancellation helpers built on AbortSignal.
 */
import { AgentryError } from './errors.js';

/** Raised by work that stops because its signal was aborted. */
export class CancelledError extends AgentryError {
  constructor(message = 'Operation cancelled') {
    super({ message, code: 'CANCELLED', statusCode: 499 });
    this.name = 'CancelledError';
  }
}

/**
 * Whether an error is the expected outcome of cancelling work.
 * With a signal, the signal's own abort reason also counts.
 */
export function isCancellationError(error: unknown, signal?: AbortSignal): boolean {
  if (error instanceof CancelledError) return true;
  if (signal?.aborted === true && error === signal.reason) return true;
  return error instanceof Error && error.name === 'AbortError';
}

/** Throw a CancelledError if the signal has been aborted. */
export function throwIfCancelled(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new CancelledError();
  }
}

/** Outcome of waiting on a promise for a bounded time. */
export type BoundedWait<T> =
  | { readonly timedOut: false; readonly value: T }
  | { readonly timedOut: true };

/**
 * Wait for a promise for at most `timeoutMs`.
 * The promise keeps running after a timeout; only the wait is abandoned.
 */
export async function waitAtMost<T>(promise: Promise<T>, timeoutMs: number): Promise<BoundedWait<T>> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<BoundedWait<T>>((resolve) => {
    timer = setTimeout(() => resolve({ timedOut: true }), timeoutMs);
  });

  try {
    return await Promise.race([
      promise.then((value): BoundedWait<T> => ({ timedOut: false, value })),
      timeout,
    ]);
  } finally {
    clearTimeout(timer);
  }
}
