import type { RetryOptions } from './types.js';

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BASE_DELAY_MS = 2_000;
export const DEFAULT_MAX_DELAY_MS = 10_000;

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay to wait after the given (1-based) failed attempt: the base delay
 * doubled per attempt, capped at `maxDelayMs`. 2s, 4s, 8s, 10s, 10s...
 */
export function computeBackoffDelay(
  attempt: number,
  baseDelayMs: number = DEFAULT_BASE_DELAY_MS,
  maxDelayMs: number = DEFAULT_MAX_DELAY_MS,
): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

/**
 * Run `operation` until it succeeds or the attempt budget is spent.
 *
 * The error from the last attempt is re-thrown as is, so wrapping it into a
 * domain error is up to the caller. No delay follows the final attempt.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxAttempts = DEFAULT_MAX_ATTEMPTS,
    baseDelayMs = DEFAULT_BASE_DELAY_MS,
    maxDelayMs = DEFAULT_MAX_DELAY_MS,
    shouldRetry = () => true,
    onRetry,
    sleep: sleepImpl = sleep,
  } = options;

  const startedAt = Date.now();
  let attempt = 1;
  for (;;) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error)) {
        throw error;
      }
      const delayMs = computeBackoffDelay(attempt, baseDelayMs, maxDelayMs);
      onRetry?.({
        attempt,
        maxAttempts,
        error,
        delayMs,
        elapsedMs: Date.now() - startedAt,
      });
      await sleepImpl(delayMs);
      attempt++;
    }
  }
}
