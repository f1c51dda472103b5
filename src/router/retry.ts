/**
 * Retry logic with exponential backoff for generation calls.
 *
 * Rate limits and other transient failures back off exponentially up to the
 * attempt budget. Timeouts get exactly one delayed retry. Fatal errors are
 * returned at once.
 *
 * @packageDocumentation
 */

import type { RetrySettings } from '../config/types.js';
import type { ModelRouterError, ModelRouterResult } from './types.js';
import { isRetryableError } from './types.js';

/**
 * Configuration options for retry behavior.
 */
export interface RetryConfig {
  /** Total attempts, the first call included. */
  maxAttempts: number;
  /** Base delay in milliseconds for exponential backoff. */
  baseDelayMs: number;
  /** Maximum delay in milliseconds. */
  maxDelayMs: number;
  /** Delay before the single retry a timed-out call receives. */
  timeoutRetryDelayMs: number;
  /** Jitter factor (0-1) for randomizing backoff delays. */
  jitterFactor: number;
}

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = {
  maxAttempts: 3,
  baseDelayMs: 2000,
  maxDelayMs: 30000,
  timeoutRetryDelayMs: 5000,
  jitterFactor: 0,
} as const;

/**
 * Timed-out calls are retried at most this many times.
 */
export const MAX_TIMEOUT_RETRIES = 1;

/**
 * Converts the `[retry]` config section into a {@link RetryConfig}.
 *
 * @param settings - Retry settings from configuration.
 * @returns Matching retry configuration.
 */
export function retryConfigFromSettings(settings: RetrySettings): RetryConfig {
  return {
    maxAttempts: settings.max_attempts,
    baseDelayMs: settings.base_delay_ms,
    maxDelayMs: settings.max_delay_ms,
    timeoutRetryDelayMs: settings.timeout_retry_delay_ms,
    jitterFactor: settings.jitter_factor,
  };
}

/**
 * Validates retry configuration values.
 *
 * @param config - Partial retry configuration to validate.
 * @returns Valid retry configuration with defaults applied.
 * @throws Error if configuration values are invalid.
 */
export function validateRetryConfig(config: Partial<RetryConfig> = {}): RetryConfig {
  const {
    maxAttempts = DEFAULT_RETRY_CONFIG.maxAttempts,
    baseDelayMs = DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs = DEFAULT_RETRY_CONFIG.maxDelayMs,
    timeoutRetryDelayMs = DEFAULT_RETRY_CONFIG.timeoutRetryDelayMs,
    jitterFactor = DEFAULT_RETRY_CONFIG.jitterFactor,
  } = config;

  if (maxAttempts < 1 || !Number.isInteger(maxAttempts)) {
    throw new Error(`maxAttempts must be a positive integer, got: ${String(maxAttempts)}`);
  }

  if (baseDelayMs < 0) {
    throw new Error(`baseDelayMs must be non-negative, got: ${String(baseDelayMs)}`);
  }

  if (maxDelayMs < baseDelayMs) {
    throw new Error(
      `maxDelayMs (${String(maxDelayMs)}) must be >= baseDelayMs (${String(baseDelayMs)})`
    );
  }

  if (timeoutRetryDelayMs < 0) {
    throw new Error(
      `timeoutRetryDelayMs must be non-negative, got: ${String(timeoutRetryDelayMs)}`
    );
  }

  if (jitterFactor < 0 || jitterFactor > 1) {
    throw new Error(`jitterFactor must be between 0 and 1, got: ${String(jitterFactor)}`);
  }

  return { maxAttempts, baseDelayMs, maxDelayMs, timeoutRetryDelayMs, jitterFactor };
}

/**
 * Calculates the delay before the next retry.
 *
 * - TimeoutError: the fixed `timeoutRetryDelayMs`.
 * - RateLimitError with a retry-after hint: the hint, capped at `maxDelayMs`.
 * - Otherwise: `min(maxDelayMs, baseDelayMs * 2^retryIndex) * (1 ± jitter)`.
 *
 * @param retryIndex - Zero-based index of the retry about to happen.
 * @param config - Retry configuration.
 * @param error - The error that triggered the retry.
 * @param random - Random function for jitter (injectable for testing).
 * @returns Delay in milliseconds.
 */
export function calculateBackoffDelay(
  retryIndex: number,
  config: RetryConfig,
  error?: ModelRouterError,
  random: () => number = Math.random
): number {
  if (error?.kind === 'TimeoutError') {
    return config.timeoutRetryDelayMs;
  }

  if (error?.kind === 'RateLimitError' && error.retryAfterMs !== undefined) {
    return Math.min(error.retryAfterMs, config.maxDelayMs);
  }

  const exponentialDelay = config.baseDelayMs * Math.pow(2, retryIndex);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);

  // Range: [delay * (1 - jitterFactor), delay * (1 + jitterFactor)]
  const jitterMultiplier = 1 - config.jitterFactor + random() * 2 * config.jitterFactor;
  return Math.round(cappedDelay * jitterMultiplier);
}

/**
 * Decides whether a failed attempt gets another try.
 *
 * @param error - The error from the latest attempt.
 * @param attemptsMade - Attempts made so far, the failing one included.
 * @param timeoutsSeen - Timeouts seen so far, the failing one included.
 * @param config - Retry configuration.
 * @returns True if another attempt should be made.
 */
export function shouldRetry(
  error: ModelRouterError,
  attemptsMade: number,
  timeoutsSeen: number,
  config: RetryConfig
): boolean {
  if (!isRetryableError(error) || attemptsMade >= config.maxAttempts) {
    return false;
  }
  if (error.kind === 'TimeoutError') {
    return timeoutsSeen <= MAX_TIMEOUT_RETRIES;
  }
  return true;
}

/**
 * Information about a retry attempt.
 */
export interface RetryAttemptInfo {
  /** The attempt about to run (1-indexed). */
  attempt: number;
  /** Upper bound on attempts. */
  maxAttempts: number;
  /** Delay before this attempt in milliseconds. */
  delayMs: number;
  /** The error from the previous attempt. */
  previousError: ModelRouterError;
}

/**
 * Callback type for retry attempt notifications.
 */
export type RetryCallback = (info: RetryAttemptInfo) => void;

/**
 * Options for the withRetry function.
 */
export interface WithRetryOptions {
  /** Retry configuration (uses defaults if not provided). */
  config?: Partial<RetryConfig>;
  /** Callback invoked before each retry attempt. */
  onRetry?: RetryCallback;
  /** Sleep function for delays (injectable for testing). */
  sleep?: (ms: number) => Promise<void>;
  /** Random function for jitter (injectable for testing). */
  random?: () => number;
}

/**
 * Outcome of {@link withRetry}.
 */
export interface RetryOutcome {
  /** The final result, success or the last failure. */
  result: ModelRouterResult;
  /** Number of attempts made. */
  attempts: number;
}

/**
 * Default sleep implementation using setTimeout.
 *
 * @param ms - Milliseconds to sleep.
 * @returns Promise that resolves after the delay.
 */
export function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs an operation, retrying transient failures.
 *
 * @param operation - The async function to execute with retries.
 * @param options - Retry options.
 * @returns The final result and how many attempts it took.
 *
 * @example
 * ```typescript
 * const { result, attempts } = await withRetry(() => router.complete(request), {
 *   config: { maxAttempts: 3, baseDelayMs: 1000 },
 *   onRetry: (info) => logger.warn('generation_retry', { ...info }),
 * });
 * ```
 */
export async function withRetry(
  operation: () => Promise<ModelRouterResult>,
  options: WithRetryOptions = {}
): Promise<RetryOutcome> {
  const config = validateRetryConfig(options.config);
  const sleep = options.sleep ?? defaultSleep;
  const random = options.random ?? Math.random;

  let attempts = 0;
  let timeoutsSeen = 0;

  for (;;) {
    const result = await operation();
    attempts++;

    if (result.success) {
      return { result, attempts };
    }

    const error = result.error;
    if (error.kind === 'TimeoutError') {
      timeoutsSeen++;
    }

    if (!shouldRetry(error, attempts, timeoutsSeen, config)) {
      return { result, attempts };
    }

    const delayMs = calculateBackoffDelay(attempts - 1, config, error, random);
    options.onRetry?.({
      attempt: attempts + 1,
      maxAttempts: config.maxAttempts,
      delayMs,
      previousError: error,
    });
    await sleep(delayMs);
  }
}
