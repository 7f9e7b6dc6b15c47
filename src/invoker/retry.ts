// ============================================================================
// Retry Policy
// ============================================================================
// Exponential backoff with a bounded attempt count. The delay after failed
// attempt n (1-based) is multiplierMs * 2^(n-1), clamped to
// [minDelayMs, maxDelayMs]. With the defaults: 2s, 4s, 8s, 16s, 32s, 64s
// between seven attempts.
// ============================================================================

import type { Callback } from '../registry/types.js';

export interface RetryPolicy {
  /** Total attempts, including the first */
  attempts: number;
  multiplierMs: number;
  minDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  attempts: 7,
  multiplierMs: 2_000,
  minDelayMs: 1_000,
  maxDelayMs: Number.POSITIVE_INFINITY,
});

export function resolveRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy = { ...DEFAULT_RETRY_POLICY, ...overrides };
  if (!Number.isInteger(policy.attempts) || policy.attempts < 1) {
    throw new RangeError(`Retry attempts must be a positive integer, got ${policy.attempts}`);
  }
  if (policy.minDelayMs < 0 || policy.multiplierMs < 0 || policy.maxDelayMs < policy.minDelayMs) {
    throw new RangeError(
      `Invalid retry delays: multiplier=${policy.multiplierMs} min=${policy.minDelayMs} max=${policy.maxDelayMs}`
    );
  }
  return policy;
}

/** Delay to wait after `attempt` (1-based) has failed. */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const raw = policy.multiplierMs * 2 ** (attempt - 1);
  return Math.min(policy.maxDelayMs, Math.max(policy.minDelayMs, raw));
}

export interface RetryInfo {
  /** The attempt that just failed */
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryHooks {
  onAttempt?: (attempt: number) => void;
  onRetry?: (info: RetryInfo) => void;
}

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Run `fn` until it resolves or the policy runs out. The last error is
 * rethrown exactly as `fn` threw it.
 */
export async function retryAsync<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
  sleep: Sleep = defaultSleep
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    hooks.onAttempt?.(attempt);
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= policy.attempts) throw err;

      const delayMs = backoffDelay(policy, attempt);
      hooks.onRetry?.({ attempt, delayMs, error: err });
      await sleep(delayMs);
    }
  }
}

export type Schedule = (fn: () => void, ms: number) => void;

export const defaultSchedule: Schedule = (fn, ms) => {
  setTimeout(fn, ms);
};

/**
 * Callback counterpart of retryAsync. `done` is called exactly once, with
 * the result or with the error of the final attempt.
 */
export function retryCallback<T>(
  fn: (attempt: number, done: Callback<T>) => void,
  policy: RetryPolicy,
  done: Callback<T>,
  hooks: RetryHooks = {},
  schedule: Schedule = defaultSchedule
): void {
  const run = (attempt: number): void => {
    hooks.onAttempt?.(attempt);

    let settled = false;
    const settle: Callback<T> = (err, result) => {
      if (settled) return;
      settled = true;

      if (!err) {
        done(null, result);
        return;
      }
      if (attempt >= policy.attempts) {
        done(err);
        return;
      }

      const delayMs = backoffDelay(policy, attempt);
      hooks.onRetry?.({ attempt, delayMs, error: err });
      schedule(() => run(attempt + 1), delayMs);
    };

    try {
      fn(attempt, settle);
    } catch (err) {
      // A throw from the caller's own callback is theirs to handle
      if (settled) throw err;
      settle(err instanceof Error ? err : new Error(String(err)));
    }
  };

  run(1);
}
