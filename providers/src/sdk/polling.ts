import type { ProviderLogger, TaskResult } from '../types.js';
import { sleep } from './abort.js';
import { WarningCode } from '@vidbridge/core';

export const DEFAULT_POLL_INTERVAL_MS = 5000;

export interface PollingOptions {
  /**
   * Delay before each status check. Non-positive values fall back to 5000;
   * values past the timer range are capped by `sleep`.
   */
  intervalMs?: number;
  signal?: AbortSignal;
  logger?: ProviderLogger;
  provider?: string;
}

/**
 * Polls `fetchResult` until the task reaches a terminal status.
 *
 * Every check waits one interval first, so a signal that is already aborted
 * rejects before any call is made. `queued` and `processing` keep polling;
 * `succeeded`, `failed` and any status outside the vocabulary end it. There is
 * no built-in deadline: only `signal` bounds the wait.
 */
export async function pollForCompletion(
  fetchResult: (taskId: string, signal?: AbortSignal) => Promise<TaskResult>,
  taskId: string,
  options: PollingOptions = {},
): Promise<TaskResult> {
  const { signal, logger, provider } = options;
  const intervalMs = options.intervalMs !== undefined && options.intervalMs > 0
    ? options.intervalMs
    : DEFAULT_POLL_INTERVAL_MS;

  for (let attempt = 1; ; attempt++) {
    await sleep(intervalMs, signal);
    const result = await fetchResult(taskId, signal);

    logger?.debug?.('providers.polling.attempt', {
      provider,
      taskId,
      attempt,
      status: result.status,
    });

    switch (result.status) {
      case 'queued':
      case 'processing':
        continue;
      case 'succeeded':
      case 'failed':
        return result;
      default:
        logger?.warn?.('providers.polling.unknownStatus', {
          code: WarningCode.UNKNOWN_TERMINAL_STATUS,
          provider,
          taskId,
          status: String(result.status),
        });
        return result;
    }
  }
}
