/**
 * Outbound Call Rate Limiter
 *
 * Outermost layer around invoice API calls. Two limits apply in order:
 * - a concurrency budget with a bounded FIFO queue of waiters
 * - a local token bucket (tokensPerSecond, burstCapacity)
 *
 * Both waits share one deadline (acquireTimeoutMs). Rejected callers never
 * hold a slot.
 */

import { log } from "../logger.js";
import { rateLimitRejectionsTotal } from "../metrics.js";

export interface CallRateLimiterConfig {
  maxConcurrent: number;
  maxQueued: number;
  acquireTimeoutMs: number;
  tokensPerSecond: number;
  /** Max tokens to accumulate (default: tokensPerSecond) */
  burstCapacity?: number;
}

export type RateLimitRejectReason = "queue_full" | "timeout";

export type RateLimitResult =
  | { allowed: true; release: () => void }
  | { allowed: false; reason: RateLimitRejectReason };

export interface CallRateLimiterStatus {
  inFlight: number;
  queued: number;
  tokens: number;
}

interface Waiter {
  grant: () => void;
  timer: NodeJS.Timeout;
}

export class CallRateLimiter {
  private inFlight = 0;
  private readonly waiters: Waiter[] = [];
  private tokens: number;
  private lastRefill: number;
  private readonly burstCapacity: number;

  constructor(
    private readonly config: CallRateLimiterConfig,
    private readonly now: () => number = Date.now
  ) {
    this.burstCapacity = config.burstCapacity ?? config.tokensPerSecond;
    this.tokens = this.burstCapacity;
    this.lastRefill = this.now();
  }

  async acquire(): Promise<RateLimitResult> {
    const deadline = this.now() + this.config.acquireTimeoutMs;

    const slot = await this.acquireSlot();
    if (slot !== "granted") {
      return this.reject(slot);
    }

    let released = false;
    const release = (): void => {
      if (released) return;
      released = true;
      this.releaseSlot();
    };

    const gotToken = await this.takeToken(deadline);
    if (!gotToken) {
      release();
      return this.reject("timeout");
    }

    return { allowed: true, release };
  }

  status(): CallRateLimiterStatus {
    this.refill();
    return {
      inFlight: this.inFlight,
      queued: this.waiters.length,
      tokens: Math.floor(this.tokens),
    };
  }

  private acquireSlot(): Promise<"granted" | RateLimitRejectReason> {
    if (this.inFlight < this.config.maxConcurrent && this.waiters.length === 0) {
      this.inFlight++;
      return Promise.resolve("granted");
    }

    if (this.waiters.length >= this.config.maxQueued) {
      return Promise.resolve("queue_full");
    }

    return new Promise((resolve) => {
      const waiter: Waiter = {
        grant: () => resolve("granted"),
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) this.waiters.splice(index, 1);
          resolve("timeout");
        }, this.config.acquireTimeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  private releaseSlot(): void {
    const next = this.waiters.shift();
    if (next) {
      // Hand the slot over directly; inFlight is unchanged
      clearTimeout(next.timer);
      next.grant();
      return;
    }
    this.inFlight--;
  }

  private refill(): void {
    const now = this.now();
    const elapsedSeconds = (now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.burstCapacity, this.tokens + elapsedSeconds * this.config.tokensPerSecond);
    this.lastRefill = now;
  }

  private async takeToken(deadline: number): Promise<boolean> {
    for (;;) {
      this.refill();
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return true;
      }

      const waitMs = Math.ceil(((1 - this.tokens) / this.config.tokensPerSecond) * 1000);
      if (this.now() + waitMs > deadline) {
        return false;
      }
      await new Promise((resolve) => setTimeout(resolve, waitMs));
    }
  }

  private reject(reason: RateLimitRejectReason): RateLimitResult {
    rateLimitRejectionsTotal.inc({ reason });
    log.rateLimit.warn(
      { reason, inFlight: this.inFlight, queued: this.waiters.length },
      "call rejected by rate limiter"
    );
    return { allowed: false, reason };
  }
}
