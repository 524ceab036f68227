/**
 * Retry Utilities
 *
 * Bounded exponential backoff with jitter for calls that go through an
 * idempotent, identity-keyed write path. Only transient transport failures
 * are retried; conflicts and validation errors return immediately.
 */

import { isTransientError, toError } from "../errors/app.errors";

/** Retry behaviour for a single call site */
export interface RetryConfig {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Base delay in ms for exponential backoff */
  baseDelayMs: number;
  /** Maximum delay in ms */
  maxDelayMs: number;
  /** Jitter factor (0-1) applied symmetrically around the delay */
  jitterFactor: number;
}

export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = {
  maxAttempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 3000,
  jitterFactor: 0.2,
};

/**
 * Calculate delay for exponential backoff with jitter.
 * `attempt` is zero-based: the delay after the first failure uses 0.
 */
export function calculateBackoff(
  attempt: number,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  random: () => number = Math.random,
): number {
  const { baseDelayMs, maxDelayMs, jitterFactor } = config;

  const exponentialDelay = Math.min(
    baseDelayMs * Math.pow(2, attempt),
    maxDelayMs,
  );

  // random() in [0,1) maps to a factor in [1 - jitter, 1 + jitter)
  const factor = 1 + jitterFactor * (2 * random() - 1);

  return Math.max(0, Math.round(exponentialDelay * factor));
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryResult<T> {
  success: boolean;
  data?: T;
  error?: Error;
  attempts: number;
}

export interface RetryOptions extends Partial<RetryConfig> {
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

/**
 * Execute a function with retry logic.
 *
 * Non-transient errors are rethrown so they propagate to the caller;
 * exhausting the attempts on transient errors resolves with success=false.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<RetryResult<T>> {
  const config: RetryConfig = {
    maxAttempts: options.maxAttempts ?? DEFAULT_RETRY_CONFIG.maxAttempts,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
    jitterFactor: options.jitterFactor ?? DEFAULT_RETRY_CONFIG.jitterFactor,
  };
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, config.maxAttempts);

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const data = await fn(attempt);
      return { success: true, data, attempts: attempt };
    } catch (err) {
      if (!isTransientError(err)) {
        throw err;
      }
      lastError = toError(err);

      if (attempt >= maxAttempts) {
        return { success: false, error: lastError, attempts: attempt };
      }

      const delayMs = calculateBackoff(attempt - 1, config, options.random);
      options.onRetry?.(attempt, lastError, delayMs);
      await wait(delayMs);
    }
  }

  return { success: false, error: lastError, attempts: maxAttempts };
}
