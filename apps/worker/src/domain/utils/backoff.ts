/**
 * Pure utility functions for exponential backoff calculation.
 * These are fully unit-testable with no side effects.
 */

export interface BackoffOptions {
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Growth factor between steps (default: 2) */
  multiplier?: number;
  /** Jitter factor 0-1 to add randomness (default: 0) */
  jitterFactor?: number;
  /** Source of randomness in [0, 1) (default: Math.random) */
  random?: () => number;
}

const DEFAULT_BACKOFF_OPTIONS: Required<BackoffOptions> = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  multiplier: 2,
  jitterFactor: 0,
  random: Math.random,
};

/**
 * Un-jittered delay for an attempt: base * multiplier^attempt, capped.
 */
export function backoffStep(attempt: number, options?: BackoffOptions): number {
  const { baseDelayMs, maxDelayMs, multiplier } = { ...DEFAULT_BACKOFF_OPTIONS, ...options };
  return Math.min(baseDelayMs * Math.pow(multiplier, attempt), maxDelayMs);
}

/**
 * Calculate exponential backoff delay.
 *
 * Jitter stays inside the band between this step and the next one, so a
 * sequence of delays never decreases and never exceeds maxDelayMs.
 *
 * @param attempt - The attempt number (0-indexed, so first retry is attempt 0)
 *
 * @example
 * // Default: 1s, 2s, 4s, 8s, 16s, 30s (capped)
 * calculateBackoff(0) // 1000
 * calculateBackoff(1) // 2000
 * calculateBackoff(5) // 30000 (capped)
 *
 * @example
 * // Jittered: 4000..6000 for the third attempt
 * calculateBackoff(2, { jitterFactor: 0.5 })
 */
export function calculateBackoff(attempt: number, options?: BackoffOptions): number {
  const resolved = { ...DEFAULT_BACKOFF_OPTIONS, ...options };
  const current = backoffStep(attempt, resolved);

  if (resolved.jitterFactor > 0) {
    const next = backoffStep(attempt + 1, resolved);
    const band = (next - current) * resolved.jitterFactor;
    return Math.floor(current + band * resolved.random());
  }

  return current;
}

/**
 * Calculate backoff for NATS message redelivery.
 * Uses deliveryCount which is 1-indexed (first delivery = 1).
 */
export function calculateNatsBackoff(
  deliveryCount: number,
  options?: BackoffOptions
): number {
  const attempt = Math.max(0, deliveryCount - 1);
  return calculateBackoff(attempt, options);
}

/**
 * Redelivery delay after a dead-letter write failed.
 * First release: 5s, then 10s, 20s, 40s, up to 60s max.
 */
export function calculateReleaseBackoff(deliveryCount: number): number {
  return calculateNatsBackoff(deliveryCount, {
    baseDelayMs: 5000,
    maxDelayMs: 60000,
  });
}
