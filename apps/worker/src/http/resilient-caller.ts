import { log } from "../logger.js";
import { apiCallDuration, apiCallOutcomesTotal } from "../metrics.js";
import { CredentialError, errorMessage } from "../errors.js";
import { retryWhile, TimeoutDelayProvider, type DelayProvider } from "../domain/utils/retry.js";
import { interpretResponse, type AttemptResult } from "../domain/invoice-response/interpret.js";
import type { CircuitBreakerStatus } from "../domain/circuit-breaker/types.js";
import type { CallOutcome, Credential, WorkItem } from "../types/index.js";
import type { CircuitBreaker } from "./circuit-breaker.js";
import type { InvoiceApi } from "./invoice-api-client.js";
import type { CallRateLimiter, CallRateLimiterStatus } from "../rate-limiting/call-rate-limiter.js";

// =============================================================================
// Resilient Caller
// =============================================================================
// Wraps one outbound invoice call, outermost to innermost:
// - rate limiter (concurrency budget + token bucket)
// - circuit breaker, consulted once per call and told the final outcome
// - bounded retry with jittered exponential backoff
// - timeout-bound single attempt (credential + POST + interpretation)
//
// call() never rejects; every failure becomes a CallOutcome.
// =============================================================================

export interface CredentialProvider {
  acquire(): Promise<Credential>;
  invalidate(): void;
}

export interface CallRetryPolicy {
  /** Attempts in total, including the first */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  jitterFactor: number;
}

export interface ResilientCallerDeps {
  api: InvoiceApi;
  credentials: CredentialProvider;
  breaker: CircuitBreaker;
  limiter: CallRateLimiter;
  retry: CallRetryPolicy;
  delayProvider?: DelayProvider;
  random?: () => number;
}

export interface ResilientCallerStatus {
  endpoint: string;
  circuit: CircuitBreakerStatus;
  limiter: CallRateLimiterStatus;
}

/** One attempt's result, and whether a request actually reached the endpoint */
type Attempt = AttemptResult & { reachedEndpoint: boolean };

function isRetryableAttempt(attempt: Attempt): boolean {
  return attempt.kind === "retryable";
}

export class ResilientCaller {
  private readonly delayProvider: DelayProvider;

  constructor(private readonly deps: ResilientCallerDeps) {
    this.delayProvider = deps.delayProvider ?? new TimeoutDelayProvider();
  }

  async call(item: WorkItem): Promise<CallOutcome> {
    const endTimer = apiCallDuration.startTimer();
    const outcome = await this.callLimited(item);

    endTimer({ kind: outcome.kind });
    apiCallOutcomesTotal.inc({
      kind: outcome.kind,
      failure_type: outcome.kind === "success" ? "none" : outcome.failureType,
    });

    return outcome;
  }

  status(): ResilientCallerStatus {
    return {
      endpoint: this.deps.api.endpoint,
      circuit: this.deps.breaker.status(),
      limiter: this.deps.limiter.status(),
    };
  }

  private async callLimited(item: WorkItem): Promise<CallOutcome> {
    const permit = await this.deps.limiter.acquire();
    if (!permit.allowed) {
      return {
        kind: "retryable",
        failureType: "RateLimited",
        reason: `rate limited (${permit.reason})`,
        attempts: 0,
      };
    }

    try {
      return await this.callWithRetry(item);
    } finally {
      permit.release();
    }
  }

  private async callWithRetry(item: WorkItem): Promise<CallOutcome> {
    const { retry, random, breaker, api } = this.deps;

    if (!breaker.tryAcquire()) {
      return {
        kind: "retryable",
        failureType: "CircuitOpen",
        reason: `circuit open for ${api.endpoint}`,
        attempts: 0,
      };
    }

    const { value, attempts } = await retryWhile(
      () => this.attempt(item),
      {
        maxAttempts: retry.maxAttempts,
        baseDelayMs: retry.baseDelayMs,
        maxDelayMs: retry.maxDelayMs,
        multiplier: retry.multiplier,
        jitterFactor: retry.jitterFactor,
        random,
        isRetryable: isRetryableAttempt,
        onRetry: (attempt, result, delayMs) => {
          if (result.kind !== "success") {
            log.api.debug(
              { invoiceId: item.id, attempt, delayMs, failureType: result.failureType, reason: result.reason },
              "retrying call"
            );
          }
        },
      },
      this.delayProvider
    );

    this.report(value);

    if (value.kind === "success") {
      return { kind: "success", attempts, remoteStatus: value.remoteStatus };
    }
    return { kind: value.kind, failureType: value.failureType, reason: value.reason, attempts };
  }

  /** Settle the breaker permit taken for this call */
  private report(final: Attempt): void {
    const { breaker } = this.deps;

    if (final.kind === "success") {
      breaker.onSuccess();
    } else if (!final.reachedEndpoint) {
      breaker.onIgnored();
    } else if (final.failureType === "AuthRejected" || final.failureType === "RemotePermanent") {
      // Says nothing about endpoint health
      breaker.onIgnored();
    } else {
      breaker.onFailure();
    }
  }

  private async attempt(item: WorkItem): Promise<Attempt> {
    const { credentials, api } = this.deps;

    let credential: Credential;
    try {
      credential = await credentials.acquire();
    } catch (error) {
      if (error instanceof CredentialError && !error.retryable) {
        return { kind: "permanent", failureType: "AuthRejected", reason: error.message, reachedEndpoint: false };
      }
      return { kind: "retryable", failureType: "TransientInfra", reason: errorMessage(error), reachedEndpoint: false };
    }

    let status: number;
    let bodyText: string;
    try {
      ({ status, bodyText } = await api.submit(item.id, credential.token));
    } catch (error) {
      return { kind: "retryable", failureType: "TransientInfra", reason: errorMessage(error), reachedEndpoint: true };
    }

    const result = interpretResponse(status, bodyText);
    if (result.kind !== "success" && result.failureType === "AuthRejected") {
      // The endpoint refused a token we considered valid
      credentials.invalidate();
    }

    return { ...result, reachedEndpoint: true };
  }
}
