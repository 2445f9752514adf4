import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { CallRateLimiter } from "../../../rate-limiting/call-rate-limiter.js";

describe("CallRateLimiter", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const limiterWith = (overrides: Partial<ConstructorParameters<typeof CallRateLimiter>[0]> = {}) =>
    new CallRateLimiter(
      {
        maxConcurrent: 2,
        maxQueued: 1,
        acquireTimeoutMs: 1000,
        tokensPerSecond: 100,
        ...overrides,
      },
      () => Date.now()
    );

  describe("concurrency budget", () => {
    it("should admit up to maxConcurrent callers", async () => {
      const limiter = limiterWith();

      const a = await limiter.acquire();
      const b = await limiter.acquire();

      expect(a.allowed).toBe(true);
      expect(b.allowed).toBe(true);
      expect(limiter.status().inFlight).toBe(2);
    });

    it("should reject when the queue is full", async () => {
      const limiter = limiterWith();
      await limiter.acquire();
      await limiter.acquire();
      void limiter.acquire(); // queued

      expect(await limiter.acquire()).toEqual({ allowed: false, reason: "queue_full" });
    });

    it("should hand a released slot to the oldest waiter", async () => {
      const limiter = limiterWith();
      const a = await limiter.acquire();
      await limiter.acquire();
      const waiting = limiter.acquire();
      expect(limiter.status().queued).toBe(1);

      if (a.allowed) a.release();

      const c = await waiting;
      expect(c.allowed).toBe(true);
      expect(limiter.status()).toMatchObject({ inFlight: 2, queued: 0 });
    });

    it("should time out a waiter that never gets a slot", async () => {
      const limiter = limiterWith({ maxConcurrent: 1, maxQueued: 5 });
      await limiter.acquire();
      const waiting = limiter.acquire();

      await vi.advanceTimersByTimeAsync(1000);

      expect(await waiting).toEqual({ allowed: false, reason: "timeout" });
      expect(limiter.status()).toMatchObject({ inFlight: 1, queued: 0 });
    });

    it("should ignore a second release of the same permit", async () => {
      const limiter = limiterWith();
      const a = await limiter.acquire();

      if (a.allowed) {
        a.release();
        a.release();
      }

      expect(limiter.status().inFlight).toBe(0);
    });
  });

  describe("token bucket", () => {
    it("should wait for a token within the deadline", async () => {
      const limiter = limiterWith({ maxConcurrent: 10, tokensPerSecond: 2 });
      await limiter.acquire();
      await limiter.acquire();

      let settled = false;
      const third = limiter.acquire().then((result) => {
        settled = true;
        return result;
      });

      await vi.advanceTimersByTimeAsync(499);
      expect(settled).toBe(false);

      await vi.advanceTimersByTimeAsync(1);
      expect((await third).allowed).toBe(true);
    });

    it("should reject at once when no token can arrive before the deadline", async () => {
      const limiter = limiterWith({ maxConcurrent: 10, tokensPerSecond: 1, acquireTimeoutMs: 500 });
      await limiter.acquire();

      expect(await limiter.acquire()).toEqual({ allowed: false, reason: "timeout" });
      // The rejected caller gave its slot back
      expect(limiter.status().inFlight).toBe(1);
    });

    it("should cap accumulated tokens at the burst capacity", async () => {
      const limiter = limiterWith({ tokensPerSecond: 10, burstCapacity: 3 });

      await vi.advanceTimersByTimeAsync(60_000);

      expect(limiter.status().tokens).toBe(3);
    });
  });
});
