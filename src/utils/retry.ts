/**
 * Retry utility with exponential backoff.
 * Used where a freshly started server may not accept connections yet.
 */

import { DEFAULT_TUNING } from "../config/defaults.js";

/**
 * Retry options.
 */
export interface RetryOptions {
  /** Maximum number of retries */
  maxRetries: number;
  /** Initial delay in milliseconds */
  initialDelayMs: number;
  /** Maximum delay in milliseconds */
  maxDelayMs: number;
  /** Backoff multiplier */
  backoffMultiplier: number;
  /** Jitter factor (0-1) to add randomness */
  jitterFactor: number;
  /** Function to determine if error is retryable */
  isRetryable?: (error: unknown) => boolean;
  /** Callback on retry */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Abort waiting between attempts */
  signal?: AbortSignal;
}

/**
 * Default retry options.
 */
export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: DEFAULT_TUNING.retry.max_retries,
  initialDelayMs: DEFAULT_TUNING.timeouts.retry_initial_ms,
  maxDelayMs: DEFAULT_TUNING.timeouts.retry_max_ms,
  backoffMultiplier: DEFAULT_TUNING.retry.backoff_multiplier,
  jitterFactor: DEFAULT_TUNING.retry.jitter_factor,
  isRetryable: isTransientError,
};

const TRANSIENT_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "EPIPE",
  "ETIMEDOUT",
  "EAI_AGAIN",
]);

/**
 * Determine if an error is transient and retryable.
 *
 * @param error - The error to check
 * @returns True for connection-level network errors
 */
export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  if ("code" in error && typeof error.code === "string") {
    return TRANSIENT_CODES.has(error.code);
  }

  const message = error.message.toLowerCase();
  return (
    message.includes("econnrefused") ||
    message.includes("econnreset") ||
    message.includes("socket hang up")
  );
}

/**
 * Calculate delay for a retry attempt with exponential backoff and jitter.
 *
 * @param attempt - Current attempt number (0-indexed)
 * @param options - Retry options
 * @returns Delay in milliseconds
 */
export function calculateDelay(attempt: number, options: RetryOptions): number {
  const exponentialDelay =
    options.initialDelayMs * Math.pow(options.backoffMultiplier, attempt);

  const cappedDelay = Math.min(exponentialDelay, options.maxDelayMs);

  const jitter = cappedDelay * options.jitterFactor * Math.random();

  return Math.floor(cappedDelay + jitter);
}

/**
 * Sleep for a given duration.
 *
 * @param ms - Duration in milliseconds
 * @returns Promise that resolves after the delay
 */
export async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic.
 *
 * @param fn - Function to execute
 * @param options - Retry options (optional)
 * @returns Result of the function
 * @throws Last error if all retries are exhausted
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const opts: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options };
  let lastError: unknown;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      const shouldRetry =
        attempt < opts.maxRetries &&
        opts.signal?.aborted !== true &&
        (opts.isRetryable?.(error) ?? isTransientError(error));

      if (!shouldRetry) {
        throw error;
      }

      const delayMs = calculateDelay(attempt, opts);
      opts.onRetry?.(error, attempt + 1, delayMs);
      await sleep(delayMs);
    }
  }

  throw lastError;
}
