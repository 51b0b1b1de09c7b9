import { setTimeout as sleep } from 'timers/promises';
import { isRetryableError } from './errors';
import type { CallOptions, Logger, RetryPolicy } from './types';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  multiplier: 2,
};

export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy = { ...DEFAULT_RETRY_POLICY, ...overrides };
  return {
    ...policy,
    maxAttempts: Math.max(1, Math.floor(policy.maxAttempts)),
  };
}

/**
 * Delay before retry number `retry` (1 for the second attempt):
 * `baseDelay * retry * multiplier`, capped at `maxDelay`.
 */
export function computeBackoffDelay(retry: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * retry * policy.multiplier, policy.maxDelayMs);
}

export interface RetryAttemptInfo {
  /** The attempt that is about to run. */
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions extends CallOptions {
  logger?: Logger;
  /** Label used in log entries. */
  operation?: string;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (info: RetryAttemptInfo) => void;
}

/**
 * Runs `work` up to `policy.maxAttempts` times. Errors that are not retryable
 * end the loop at once; otherwise the last error is thrown after the final
 * attempt. Cancellation through `signal` interrupts any backoff wait and
 * surfaces the signal's reason.
 */
export async function runWithRetry<T>(
  policy: RetryPolicy,
  work: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const { signal, logger } = options;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  const shouldRetry = options.shouldRetry ?? isRetryableError;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    signal?.throwIfAborted();

    try {
      return await work(attempt);
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }
      lastError = error;

      if (!shouldRetry(error, attempt) || attempt === maxAttempts) {
        logger?.error?.('dokan.request.failed', {
          operation: options.operation,
          attempt,
          maxAttempts,
          error: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }

      const delayMs = computeBackoffDelay(attempt, policy);
      logger?.warn?.('dokan.request.retry', {
        operation: options.operation,
        attempt,
        maxAttempts,
        nextDelayMs: delayMs,
        error: error instanceof Error ? error.message : String(error),
      });
      options.onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs, error });

      await waitForRetry(delayMs, signal);
    }
  }

  throw lastError;
}

async function waitForRetry(delayMs: number, signal?: AbortSignal): Promise<void> {
  try {
    await sleep(delayMs, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw signal.reason;
    }
    throw error;
  }
}
