/**
 * Bounded exponential backoff for sheet store calls. Only errors the policy
 * classifies as transient (rate limiting) are retried; anything else is
 * rethrown unchanged.
 */

import { RemoteTransientError, RetryLimitExceededError, errorMessage } from './errors.js';
import { logger } from './logger.js';

export interface RetryPolicy {
  /** Total calls, including the first */
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  /** Fraction (0..1) of each delay that may be randomly removed */
  readonly jitter: number;
  /** Give up early when the accumulated wait would pass this bound */
  readonly maxTotalDelayMs?: number;
  readonly isTransient: (err: unknown) => boolean;
}

export interface RetryNotice {
  readonly operation: string;
  /** 1-based number of the attempt that just failed */
  readonly attempt: number;
  readonly delayMs: number;
  readonly error: unknown;
}

export interface RetryHooks {
  readonly sleep?: (ms: number) => Promise<void>;
  readonly onRetry?: (notice: RetryNotice) => void;
}

export function isRateLimited(err: unknown): boolean {
  return err instanceof RemoteTransientError;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  jitter: 0,
  isTransient: isRateLimited,
};

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/** Delay before retrying after the given 0-based attempt: base * 2^attempt, less jitter */
export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const full = policy.baseDelayMs * Math.pow(2, attempt);
  if (policy.jitter <= 0) return full;
  return Math.round(full * (1 - Math.min(policy.jitter, 1) * random()));
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  operation = 'sheet store call',
  hooks: RetryHooks = {},
): Promise<T> {
  const wait = hooks.sleep ?? sleep;
  let waited = 0;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      if (!policy.isTransient(err)) throw err;

      const attempts = attempt + 1;
      if (attempts >= policy.maxAttempts) {
        throw new RetryLimitExceededError(operation, attempts, err);
      }

      const delayMs = backoffDelay(policy, attempt);
      if (policy.maxTotalDelayMs !== undefined && waited + delayMs > policy.maxTotalDelayMs) {
        throw new RetryLimitExceededError(operation, attempts, err);
      }

      logger.warn(
        { operation, attempt: attempts, delayMs, reason: errorMessage(err) },
        `Rate limited during ${operation}; waiting ${delayMs / 1000}s before retrying`,
      );
      hooks.onRetry?.({ operation, attempt: attempts, delayMs, error: err });

      await wait(delayMs);
      waited += delayMs;
    }
  }
}
