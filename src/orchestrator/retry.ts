// ---------------------------------------------------------------------------
// Retry logic with exponential backoff and jitter.
// ---------------------------------------------------------------------------

import { NetworkError } from "../core/errors.js";

// ── Types ──────────────────────────────────────────────────────────────────

export interface RetryOptions {
  /** Maximum number of retries (0 means no retries, just the initial call). */
  maxRetries: number;
  /** Base delay in milliseconds before the first retry. */
  baseDelayMs: number;
  /**
   * Predicate that decides whether a given error is retryable.
   *
   * When omitted the default policy is used: retry a `NetworkError` that
   * carries no status, a 429, or a 5xx. Everything else is permanent.
   */
  shouldRetry?: (error: unknown) => boolean;
  /** Replaces `setTimeout`-based sleeping; tests pass a no-op. */
  sleep?: (ms: number) => Promise<void>;
}

// ── Default retry predicate ────────────────────────────────────────────────

/**
 * Default predicate: only transient network failures are retried. Parse
 * errors and client errors (other than 429) will not improve on a retry.
 */
export function isTransientError(error: unknown): boolean {
  if (!(error instanceof NetworkError)) return false;
  if (error.status === null) return true;
  return error.status === 429 || error.status >= 500;
}

// ── Delay helper ───────────────────────────────────────────────────────────

/**
 * Compute the delay for a given attempt using exponential backoff with
 * full jitter (random value between 0 and the exponential ceiling).
 */
function computeDelay(attempt: number, baseDelayMs: number): number {
  const exponential = baseDelayMs * 2 ** attempt;
  return Math.round(Math.random() * exponential);
}

/** Returns a promise that resolves after `ms` milliseconds. */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ── Public API ─────────────────────────────────────────────────────────────

/**
 * Execute `fn` with retry semantics.
 *
 * On failure `shouldRetry` is consulted.  If `true`, the function sleeps
 * using exponential backoff with jitter before retrying up to
 * `maxRetries` times.
 *
 * If all attempts are exhausted, the last error is thrown.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const {
    maxRetries,
    baseDelayMs,
    shouldRetry = isTransientError,
    sleep: pause = sleep,
  } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (!shouldRetry(error) || attempt >= maxRetries) {
        throw error;
      }

      await pause(computeDelay(attempt, baseDelayMs));
    }
  }

  // Should be unreachable, but satisfy the compiler.
  throw lastError;
}
