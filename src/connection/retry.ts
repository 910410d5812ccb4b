/**
 * Bounded retry for idempotent requests.
 *
 * Only artifact fetches go through here. Submissions are never retried, so a
 * flaky network can not duplicate a job.
 */

import { TransportError } from '../domain/errors';

export interface RetryPolicy {
  /** Extra attempts after the first. */
  retries: number;
  backoffStrategy: 'fixed' | 'exponential';
  backoffBaseMs: number;
}

export const DEFAULT_FETCH_RETRY_POLICY: Readonly<RetryPolicy> = {
  retries: 2,
  backoffStrategy: 'exponential',
  backoffBaseMs: 250,
};

/** Run `fn`, retrying retryable TransportErrors up to `policy.retries` times. */
export async function withRetries<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_FETCH_RETRY_POLICY,
  onRetry?: (err: TransportError, attempt: number, delayMs: number) => void,
): Promise<T> {
  const maxAttempts = Math.max(1, policy.retries + 1);
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      const retryable = err instanceof TransportError && err.retryable;
      if (!retryable || attempt >= maxAttempts) throw err;
      const delay = computeBackoff(policy.backoffStrategy, policy.backoffBaseMs, attempt);
      onRetry?.(err, attempt, delay);
      await sleep(delay);
    }
  }
}

/** Compute backoff delay based on strategy. */
export function computeBackoff(
  strategy: 'fixed' | 'exponential',
  baseMs: number,
  attempt: number,
): number {
  if (strategy === 'fixed') return baseMs;
  return baseMs * Math.pow(2, attempt - 1);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
