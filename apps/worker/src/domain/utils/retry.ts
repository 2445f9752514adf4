/**
 * Retry strategy implementations.
 * Fully testable with dependency injection for delays.
 */

import { calculateBackoff, type BackoffOptions } from "./backoff.js";

export interface RetryOptions extends BackoffOptions {
  /** Maximum number of attempts in total, including the first */
  maxAttempts: number;
  /** Whether a thrown error may be retried (default: always) */
  shouldRetry?: (error: Error) => boolean;
  /** Callback for each retry attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

export type RetryResult<T> =
  | { success: true; value: T; attempts: number }
  | { success: false; error: Error; attempts: number };

export interface DelayProvider {
  delay(ms: number): Promise<void>;
}

/**
 * Default delay provider using setTimeout.
 */
export class TimeoutDelayProvider implements DelayProvider {
  async delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Mock delay provider for testing (instant delays).
 */
export class InstantDelayProvider implements DelayProvider {
  public delays: number[] = [];

  async delay(ms: number): Promise<void> {
    this.delays.push(ms);
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/** Backoff fields that were actually set, so defaults are not overwritten by undefined */
function definedOnly(options: BackoffOptions): BackoffOptions {
  const result: BackoffOptions = {};
  if (options.baseDelayMs !== undefined) result.baseDelayMs = options.baseDelayMs;
  if (options.maxDelayMs !== undefined) result.maxDelayMs = options.maxDelayMs;
  if (options.multiplier !== undefined) result.multiplier = options.multiplier;
  if (options.jitterFactor !== undefined) result.jitterFactor = options.jitterFactor;
  if (options.random !== undefined) result.random = options.random;
  return result;
}

/**
 * Execute an operation that throws on failure, with retry logic.
 *
 * @example
 * const result = await executeWithRetry(
 *   () => js.publish(subject, data),
 *   { maxAttempts: 3, baseDelayMs: 1000 }
 * );
 * if (!result.success) {
 *   log.error({ error: result.error, attempts: result.attempts }, "publish failed");
 * }
 */
export async function executeWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
  delayProvider: DelayProvider = new TimeoutDelayProvider()
): Promise<RetryResult<T>> {
  const maxAttempts = Math.max(1, options.maxAttempts);
  const backoff = definedOnly(options);
  let lastError: Error = new Error("operation was not attempted");

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const value = await operation(attempt);
      return { success: true, value, attempts: attempt };
    } catch (error) {
      lastError = toError(error);

      if (options.shouldRetry && !options.shouldRetry(lastError)) {
        return { success: false, error: lastError, attempts: attempt };
      }

      if (attempt < maxAttempts) {
        const delayMs = calculateBackoff(attempt - 1, backoff);
        options.onRetry?.(attempt, lastError, delayMs);
        await delayProvider.delay(delayMs);
      }
    }
  }

  return { success: false, error: lastError, attempts: maxAttempts };
}

export interface OutcomeRetryOptions<T> extends BackoffOptions {
  maxAttempts: number;
  /** Whether a returned value asks for another attempt */
  isRetryable: (value: T) => boolean;
  onRetry?: (attempt: number, value: T, delayMs: number) => void;
}

/**
 * Retry an operation that reports failure through its return value.
 * Returns the last value together with the number of attempts made.
 */
export async function retryWhile<T>(
  operation: (attempt: number) => Promise<T>,
  options: OutcomeRetryOptions<T>,
  delayProvider: DelayProvider = new TimeoutDelayProvider()
): Promise<{ value: T; attempts: number }> {
  const maxAttempts = Math.max(1, options.maxAttempts);
  const backoff = definedOnly(options);
  let attempt = 1;

  for (;;) {
    const value = await operation(attempt);

    if (!options.isRetryable(value) || attempt >= maxAttempts) {
      return { value, attempts: attempt };
    }

    const delayMs = calculateBackoff(attempt - 1, backoff);
    options.onRetry?.(attempt, value, delayMs);
    await delayProvider.delay(delayMs);
    attempt++;
  }
}
