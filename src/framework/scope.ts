/**
 * Scoped resource acquisition and deadlines
 *
 * Acquire a resource, hand it to `use`, and release it on every exit path.
 * Release happens exactly once per successful acquisition; a failing release
 * is reported through `onReleaseError` and never masks the outcome of `use`.
 *
 *   withDeadline(signal => withScope(scope, r => work(r, signal)), { timeoutMs, label })
 */

import { TimeoutError } from './errors.js';

export interface Scope<R> {
  acquire: () => Promise<R>;
  release: (resource: R) => Promise<void>;
  onReleaseError?: (err: unknown) => void;
}

export async function withScope<R, T>(scope: Scope<R>, use: (resource: R) => Promise<T>): Promise<T> {
  const resource = await scope.acquire();
  try {
    return await use(resource);
  } finally {
    try {
      await scope.release(resource);
    } catch (err) {
      if (!scope.onReleaseError) throw err;
      scope.onReleaseError(err);
    }
  }
}

export interface DeadlineOptions {
  timeoutMs: number;

  /** Prefix of the TimeoutError message */
  label: string;

  /** Outside cancellation; its reason becomes the rejection */
  signal?: AbortSignal;

  /** How long aborted work may take to wind down (default timeoutMs) */
  graceMs?: number;

  /** Called when aborted work is still running after the grace period */
  onAbandoned?: () => void;
}

function whenAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
    } else {
      signal.addEventListener('abort', () => reject(signal.reason), { once: true });
    }
  });
}

type Settlement<T> = { state: 'fulfilled'; value: T } | { state: 'rejected' } | { state: 'pending' };

async function settleWithin<T>(work: Promise<T>, ms: number): Promise<Settlement<T>> {
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<Settlement<T>>(resolve => {
    timer = setTimeout(() => resolve({ state: 'pending' }), ms);
  });
  const settled = work.then(
    (value): Settlement<T> => ({ state: 'fulfilled', value }),
    (): Settlement<T> => ({ state: 'rejected' })
  );
  try {
    return await Promise.race([settled, expiry]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Run `work` with a signal that aborts after `timeoutMs` (reason: TimeoutError)
 * or when `options.signal` aborts. Once aborted, the call waits up to
 * `graceMs` for `work` to settle, then rejects with the abort reason, so work
 * that honors its signal never outlives the call. Work that completes anyway
 * keeps its result. Timers are always cleared.
 */
export async function withDeadline<T>(work: (signal: AbortSignal) => Promise<T>, options: DeadlineOptions): Promise<T> {
  const { timeoutMs, label, signal } = options;
  const controller = new AbortController();

  const timer = setTimeout(() => {
    controller.abort(new TimeoutError(`${label} timed out after ${timeoutMs} ms`, timeoutMs));
  }, timeoutMs);
  const forward = (): void => controller.abort(signal?.reason);
  if (signal?.aborted) {
    forward();
  } else {
    signal?.addEventListener('abort', forward, { once: true });
  }

  const running = work(controller.signal);
  try {
    return await Promise.race([running, whenAborted(controller.signal)]);
  } catch (err) {
    if (!controller.signal.aborted) throw err;
    const outcome = await settleWithin(running, options.graceMs ?? timeoutMs);
    if (outcome.state === 'fulfilled') return outcome.value;
    if (outcome.state === 'pending') options.onAbandoned?.();
    controller.signal.throwIfAborted();
    throw err;
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', forward);
  }
}
