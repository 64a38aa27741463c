// Bounded exponential backoff around a single async operation

import { sleep } from '../../utils/async.js';

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  maxTotalWaitMs: number;
}

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number; waitedMs: number }
  | { ok: false; error: unknown; attempts: number; waitedMs: number; cancelled: boolean };

export interface RetryHooks {
  signal?: AbortSignal;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

/**
 * Delay before attempt `attempt + 1`: base * 2^(attempt - 1), capped by the
 * per-wait maximum and by whatever is left of the total wait budget.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number, waitedMs: number): number {
  const exponential = policy.baseDelayMs * 2 ** (attempt - 1);
  const remaining = Math.max(0, policy.maxTotalWaitMs - waitedMs);
  return Math.min(exponential, policy.maxDelayMs, remaining);
}

export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {}
): Promise<RetryResult<T>> {
  const maxAttempts = Math.max(1, policy.attempts);
  let waitedMs = 0;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    // Checkpoint before every attempt
    if (hooks.signal?.aborted) {
      return { ok: false, error: lastError, attempts: attempt - 1, waitedMs, cancelled: true };
    }

    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt, waitedMs };
    } catch (error) {
      lastError = error;
    }

    if (attempt === maxAttempts) break;

    const delayMs = backoffDelay(policy, attempt, waitedMs);
    hooks.onRetry?.({ attempt, delayMs, error: lastError });

    const completed = await sleep(delayMs, hooks.signal);
    waitedMs += delayMs;
    if (!completed) {
      return { ok: false, error: lastError, attempts: attempt, waitedMs, cancelled: true };
    }
  }

  return { ok: false, error: lastError, attempts: maxAttempts, waitedMs, cancelled: false };
}
