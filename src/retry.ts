import { IOError, RetryExhaustedError } from "./errors.js";

export type RetryPolicy = {
  attempts: number;
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
};

export const DEFAULT_RETRY: RetryPolicy = { attempts: 3, baseDelayMs: 500, factor: 2, maxDelayMs: 8000 };

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const raw = policy.baseDelayMs * Math.pow(policy.factor, attempt - 1);
  return Math.min(raw, policy.maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn` up to `policy.attempts` times. Only `IOError`s are retried; any
 * other error propagates immediately. After the last failed attempt a
 * `RetryExhaustedError` wrapping the final cause is thrown.
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY,
  onRetry?: (err: IOError, attempt: number, delayMs: number) => void,
): Promise<T> {
  let last: unknown;
  for (let attempt = 1; attempt <= policy.attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (e) {
      if (!(e instanceof IOError)) throw e;
      last = e;
      if (attempt < policy.attempts) {
        const delay = backoffDelay(policy, attempt);
        onRetry?.(e, attempt, delay);
        await sleep(delay);
      }
    }
  }
  throw new RetryExhaustedError(policy.attempts, last);
}
