/**
 * AbortSignal helpers shared by the retry loop, the batch scheduler and the
 * WebSocket client.
 *
 * @module utils/abort
 */

import { RequestCancelledError } from './errors.js';

/**
 * Waits `ms` milliseconds. Rejects with `RequestCancelledError` as soon as
 * `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RequestCancelledError(signal.reason));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new RequestCancelledError(signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Signal for one attempt: aborts when the parent aborts or after `timeoutMs`.
 */
export interface AttemptSignal {
  readonly signal: AbortSignal;
  /** True once the deadline fired (as opposed to the parent aborting) */
  readonly timedOut: boolean;
  dispose(): void;
}

export function createAttemptSignal(parent: AbortSignal | undefined, timeoutMs: number): AttemptSignal {
  const controller = new AbortController();
  let timedOut = false;

  const onParentAbort = () => controller.abort(parent?.reason);
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort(new Error(`Deadline of ${timeoutMs}ms exceeded`));
  }, timeoutMs);

  if (parent?.aborted) {
    clearTimeout(timer);
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    get timedOut() {
      return timedOut;
    },
    dispose() {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Promise that rejects with the signal's reason once it aborts. Never
 * settles otherwise; call the returned `dispose` to drop the listener.
 */
export function abortPromise(signal: AbortSignal): { promise: Promise<never>; dispose: () => void } {
  let onAbort: () => void = () => undefined;
  const promise = new Promise<never>((_, reject) => {
    onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
  });
  return {
    promise,
    dispose: () => signal.removeEventListener('abort', onAbort),
  };
}
