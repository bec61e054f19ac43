/**
 * Bounded retry with exponential backoff
 */

import type { RetryPolicy } from './config.js';
import { isRetryableError } from './errors.js';
import type { Logger } from './logger.js';

export interface RetryOptions {
  policy: RetryPolicy;
  logger?: Logger;
  signal?: AbortSignal;
  /** Names the operation in log lines */
  description?: string;
}

/**
 * Delay before the attempt following failed attempt `attempt` (1-based)
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.backoffMs * 2 ** (attempt - 1), policy.maxBackoffMs);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `operation` until it succeeds, fails with an error that is not
 * retryable, or runs out of attempts. The last error is rethrown unchanged.
 *
 * @example
 * ```ts
 * const page = await withRetry(() => gateway.readSegmentColumn(request), {
 *   policy: { maxAttempts: 3, backoffMs: 100, maxBackoffMs: 5000 },
 * });
 * ```
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { policy, logger, signal, description = 'request' } = options;

  for (let attempt = 1; ; attempt++) {
    signal?.throwIfAborted();
    try {
      return await operation(attempt);
    } catch (error) {
      if (!isRetryableError(error) || attempt >= policy.maxAttempts || signal?.aborted) {
        throw error;
      }
      const delay = backoffDelay(policy, attempt);
      const reason = error instanceof Error ? error.message : String(error);
      logger?.warn(
        `${description} failed (attempt ${attempt}/${policy.maxAttempts}): ${reason}; retrying in ${delay}ms`
      );
      await sleep(delay, signal);
    }
  }
}
