/**
 * Retry policies attached to individual states.
 *
 * Only errors flagged retryable are retried. Retries happen inside the same
 * step and stop as soon as the step is aborted.
 */
import { setTimeout as delay } from 'timers/promises';
import { isRetryable } from './errors';

export type RetryPolicy =
  | { kind: 'none' }
  | { kind: 'fixed'; maxAttempts: number; delayMs: number }
  | { kind: 'exponential'; maxAttempts: number; baseDelayMs: number; maxDelayMs: number };

export const NO_RETRY: RetryPolicy = { kind: 'none' };

export function maxAttempts(policy: RetryPolicy): number {
  return policy.kind === 'none' ? 1 : Math.max(1, policy.maxAttempts);
}

/**
 * Delay before attempt `attempt + 1`, where `attempt` counts from 1.
 */
export function retryDelay(policy: RetryPolicy, attempt: number): number {
  switch (policy.kind) {
    case 'none':
      return 0;
    case 'fixed':
      return policy.delayMs;
    case 'exponential':
      return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
  }
}

/**
 * Attempt counter shared with the caller so that it is known even when the
 * last attempt throws.
 */
export interface AttemptTracker {
  attempts: number;
}

export async function runWithRetry<T>(
  policy: RetryPolicy,
  fn: (attempt: number) => Promise<T>,
  tracker: AttemptTracker,
  signal?: AbortSignal,
): Promise<T> {
  const limit = maxAttempts(policy);

  for (let attempt = 1; ; attempt++) {
    tracker.attempts = attempt;
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= limit || !isRetryable(error) || signal?.aborted) {
        throw error;
      }
      await delay(retryDelay(policy, attempt), undefined, { signal });
    }
  }
}
