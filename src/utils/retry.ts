/**
 * Retry, timeout and sleep helpers
 *
 * Every network-bound action goes through withRetryAndTimeout so that a
 * stalled request cannot hold a worker slot indefinitely.
 */

import { TransientNetworkError, ActionFailure, isRetryableError, toError } from './errors';
import { Clock, systemClock } from './clock';

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 2000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

export type RetryListener = (attempt: number, error: Error, delayMs: number) => void;

export interface RetryResult<T> {
  value: T;
  attempts: number;
}

/**
 * Run fn with exponential backoff on retryable errors.
 * Non-retryable errors are rethrown as-is; exhausting the retries throws
 * ActionFailure named after the action.
 */
export async function withRetry<T>(
  action: string,
  fn: (attempt: number) => Promise<T>,
  config: Partial<RetryConfig> = {},
  options: { clock?: Clock; signal?: AbortSignal; onRetry?: RetryListener } = {}
): Promise<RetryResult<T>> {
  const { maxRetries, baseDelayMs, maxDelayMs, backoffMultiplier } = {
    ...DEFAULT_RETRY_CONFIG,
    ...config,
  };
  const clock = options.clock ?? systemClock;

  let lastError: Error | null = null;

  for (let attempt = 1; attempt <= maxRetries + 1; attempt++) {
    try {
      const value = await fn(attempt);
      return { value, attempts: attempt };
    } catch (error) {
      lastError = toError(error);

      if (!isRetryableError(lastError)) {
        throw lastError;
      }

      if (attempt > maxRetries || options.signal?.aborted) {
        break;
      }

      const exponentialDelay = baseDelayMs * Math.pow(backoffMultiplier, attempt - 1);
      const delayMs = Math.min(exponentialDelay, maxDelayMs);

      options.onRetry?.(attempt, lastError, delayMs);

      await clock.sleep(delayMs, options.signal);
    }
  }

  throw new ActionFailure(
    action,
    `Failed after ${maxRetries} retries: ${lastError?.message ?? 'unknown error'}`,
    lastError ?? undefined
  );
}

/**
 * Reject with a TransientNetworkError once timeoutMs elapses; the signal handed
 * to fn is aborted at that moment so HTTP clients can drop the request.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      controller.abort();
      reject(new TransientNetworkError(`Operation timed out after ${timeoutMs}ms`, undefined, true));
    }, timeoutMs);

    fn(controller.signal)
      .then((result) => {
        clearTimeout(timeoutId);
        resolve(result);
      })
      .catch((error: unknown) => {
        clearTimeout(timeoutId);
        reject(error);
      });
  });
}

/**
 * Execute with both retry and a per-attempt timeout
 */
export async function withRetryAndTimeout<T>(
  action: string,
  fn: (signal: AbortSignal, attempt: number) => Promise<T>,
  timeoutMs: number,
  retryConfig: Partial<RetryConfig> = {},
  options: { clock?: Clock; signal?: AbortSignal; onRetry?: RetryListener } = {}
): Promise<RetryResult<T>> {
  return withRetry(
    action,
    (attempt) => withTimeout((signal) => fn(signal, attempt), timeoutMs),
    retryConfig,
    options
  );
}
