/**
 * Typed error hierarchy for the dispatch pipeline.
 *
 * Every error carries the failure type it maps to and whether the caller may
 * retry, so the resilience layers can classify without string matching.
 */

import type { FailureType } from "./types/index.js";

export interface DispatchErrorOptions {
  message: string;
  failureType: FailureType;
  retryable: boolean;
  context?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base class for all dispatch pipeline errors
 */
export class DispatchError extends Error {
  public readonly failureType: FailureType;
  public readonly retryable: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(options: DispatchErrorOptions) {
    super(options.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "DispatchError";
    this.failureType = options.failureType;
    this.retryable = options.retryable;
    this.context = options.context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      failureType: this.failureType,
      retryable: this.retryable,
      context: this.context,
    };
  }
}

// ==================== Credential Errors ====================

/**
 * Base class for failures of the credential exchange
 */
export class CredentialError extends DispatchError {
  constructor(options: Omit<DispatchErrorOptions, "failureType">) {
    super({ ...options, failureType: options.retryable ? "TransientInfra" : "AuthRejected" });
    this.name = "CredentialError";
  }
}

/**
 * The identity endpoint answered 2xx with a body we cannot use
 */
export class InvalidCredentialResponseError extends CredentialError {
  constructor(detail: string, context?: Record<string, unknown>) {
    super({ message: `Invalid credential response: ${detail}`, retryable: false, context });
    this.name = "InvalidCredentialResponseError";
  }
}

/**
 * The identity endpoint refused the grant
 */
export class AuthenticationRejectedError extends CredentialError {
  public readonly status: number;

  constructor(status: number, context?: Record<string, unknown>) {
    super({
      message: `Authentication rejected with HTTP ${status}`,
      retryable: false,
      context: { ...context, status },
    });
    this.name = "AuthenticationRejectedError";
    this.status = status;
  }
}

/**
 * The identity endpoint did not answer in time or could not be reached
 */
export class CredentialFetchTimeoutError extends CredentialError {
  constructor(timeoutMs: number, cause?: unknown) {
    super({
      message: `Credential fetch failed or timed out after ${timeoutMs}ms`,
      retryable: true,
      context: { timeoutMs },
      cause,
    });
    this.name = "CredentialFetchTimeoutError";
  }
}

// ==================== Channel Errors ====================

/**
 * Publishing to the durable channel failed after local retries
 */
export class ChannelUnavailableError extends DispatchError {
  public readonly attempts: number;

  constructor(attempts: number, cause?: unknown, context?: Record<string, unknown>) {
    super({
      message: `Channel unavailable after ${attempts} publish attempt(s): ${errorMessage(cause)}`,
      failureType: "ChannelUnavailable",
      retryable: true,
      context: { ...context, attempts },
      cause,
    });
    this.name = "ChannelUnavailableError";
    this.attempts = attempts;
  }
}

/**
 * The dead-letter channel did not confirm a record
 */
export class DeadLetterWriteError extends DispatchError {
  constructor(invoiceId: string, cause?: unknown) {
    super({
      message: `Dead-letter write failed for invoice ${invoiceId}: ${errorMessage(cause)}`,
      failureType: "ChannelUnavailable",
      retryable: true,
      context: { invoiceId },
      cause,
    });
    this.name = "DeadLetterWriteError";
  }
}

// ==================== Store Errors ====================

/**
 * The pending-work query failed
 */
export class PendingQueryError extends DispatchError {
  constructor(cause?: unknown) {
    super({
      message: `Pending invoice query failed: ${errorMessage(cause)}`,
      failureType: "TransientInfra",
      retryable: true,
      cause,
    });
    this.name = "PendingQueryError";
  }
}

// ==================== Helpers ====================

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
