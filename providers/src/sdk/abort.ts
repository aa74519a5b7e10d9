import { TimeoutError } from './errors.js';

/** Largest delay a timer honours; Node fires longer ones after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Resolves after `ms` (capped at MAX_TIMER_DELAY_MS), or rejects with
 * `signal.reason` as soon as the signal aborts. The timer never outlives the
 * promise.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.min(ms, MAX_TIMER_DELAY_MS));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface LinkedSignal {
  signal: AbortSignal;
  /** Clears the timer and detaches from the parent. Safe to call twice. */
  dispose(): void;
}

/**
 * Derives a signal that aborts when `parent` aborts (with the parent's
 * reason) or when `timeoutMs` elapses (with a TimeoutError). Zero, negative
 * and infinite timeouts never fire; finite ones are capped at
 * MAX_TIMER_DELAY_MS.
 */
export function withTimeout(parent: AbortSignal | undefined, timeoutMs: number): LinkedSignal {
  const controller = new AbortController();

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  const timer = timeoutMs > 0 && Number.isFinite(timeoutMs)
    ? setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), Math.min(timeoutMs, MAX_TIMER_DELAY_MS))
    : undefined;

  return {
    signal: controller.signal,
    dispose() {
      if (timer !== undefined) {
        clearTimeout(timer);
      }
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}
