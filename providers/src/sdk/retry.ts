import type { ProviderLogger } from '../types.js';
import { sleep } from './abort.js';
import { isRetryableError } from './errors.js';

export interface RetryOptions {
  /** Additional attempts after the first one. */
  maxRetries: number;
  /** Fixed delay between attempts. */
  retryDelayMs: number;
  signal?: AbortSignal;
  logger?: ProviderLogger;
  /** Operation name for logging (e.g. 'createGeneration'). */
  operation: string;
  provider: string;
  isRetryable?: (error: unknown) => boolean;
}

/**
 * Runs `fn` up to `maxRetries + 1` times with a fixed delay.
 *
 * A non-retryable error stops the loop at once and is rethrown as-is. When
 * attempts run out the last error is rethrown unchanged. The delay races
 * against `signal`; an abort rejects with the signal's reason.
 */
export async function runWithRetries<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const {
    maxRetries,
    retryDelayMs,
    signal,
    logger,
    operation,
    provider,
    isRetryable = isRetryableError,
  } = options;

  const maxAttempts = Math.max(0, maxRetries) + 1;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (attempt > 1) {
      logger?.debug?.('providers.retry.wait', {
        provider,
        operation,
        attempt,
        maxAttempts,
        retryAfterMs: retryDelayMs,
      });
      await sleep(retryDelayMs, signal);
    }
    if (signal?.aborted) {
      throw signal.reason;
    }

    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;
      const retryable = isRetryable(error);

      logger?.debug?.('providers.retry.error', {
        provider,
        operation,
        attempt,
        maxAttempts,
        retryable,
        error: error instanceof Error ? error.message : String(error),
      });

      if (!retryable) {
        throw error;
      }
      if (attempt < maxAttempts) {
        logger?.info?.(`${provider} ${operation} attempt ${attempt} failed, retrying in ${retryDelayMs}ms`);
      }
    }
  }

  throw lastError;
}
