/**
 * Retry with exponential backoff
 */

import { sleep as defaultSleep, type SleepFn } from './sleep';

export interface RetryOptions {
  /** Total attempts including the first one (default 3) */
  attempts?: number;

  /** Delay before the first retry (default 1000ms) */
  baseDelayMs?: number;

  /** Upper bound for a single delay (default 30s) */
  maxDelayMs?: number;

  /** Decide whether an error is worth another attempt (default: always) */
  shouldRetry?: (error: unknown) => boolean;

  /** Called before waiting for the next attempt */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;

  sleep?: SleepFn;
}

/**
 * Delay before retry number `attempt` (1-based): base, 2×base, 4×base ... capped at max
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

/**
 * Run `fn`, retrying on failure. The last error is rethrown once attempts run out
 * or `shouldRetry` rejects the error.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    attempts = 3,
    baseDelayMs = 1000,
    maxDelayMs = 30_000,
    shouldRetry = () => true,
    onRetry,
    sleep = defaultSleep,
  } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= attempts || !shouldRetry(error)) {
        throw error;
      }
      const delayMs = backoffDelay(attempt, baseDelayMs, maxDelayMs);
      onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}
