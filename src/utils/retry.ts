/**
 * Retry an async operation until it succeeds.
 * Without a bound or a delay this loops forever, trying again on the next
 * turn of the event loop.
 */

import { setImmediate } from "timers/promises";
import { RetryExhaustedError } from "./errors";
import type { RetryConfig } from "../types";

export interface RetryOptions {
  /** Total attempts before giving up; undefined retries forever */
  maxAttempts?: number;
  /** Milliseconds to wait after the given failed attempt */
  delay?: (attempt: number) => number;
  onFailedAttempt?: (error: unknown, attempt: number) => void;
}

export async function retry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const { maxAttempts, delay, onFailedAttempt } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      onFailedAttempt?.(error, attempt);

      if (maxAttempts !== undefined && attempt >= maxAttempts) {
        throw new RetryExhaustedError(attempt, error);
      }

      const wait = delay?.(attempt) ?? 0;
      if (wait > 0) {
        await new Promise((r) => setTimeout(r, wait));
      } else {
        // Let other workers and timers run before the next attempt
        await setImmediate();
      }
    }
  }
}

/**
 * Retry with no bound and no delay. Never rejects.
 */
export function retryForever<T>(
  operation: (attempt: number) => Promise<T>,
): Promise<T> {
  return retry(operation);
}

/**
 * Build retry options from the `retry` config section
 */
export function createRetryOptions(
  config: RetryConfig,
  onFailedAttempt?: RetryOptions["onFailedAttempt"],
): RetryOptions {
  return {
    maxAttempts: config.maxAttempts ?? undefined,
    delay: createDelay(config),
    onFailedAttempt,
  };
}

function createDelay(config: RetryConfig): RetryOptions["delay"] {
  switch (config.backoff) {
    case "none":
      return undefined;
    case "fixed":
      return () => config.delay;
    case "exponential":
      // delay, 2*delay, 4*delay... capped at maxDelay
      return (attempt) =>
        Math.min(config.delay * Math.pow(2, attempt - 1), config.maxDelay);
  }
}
