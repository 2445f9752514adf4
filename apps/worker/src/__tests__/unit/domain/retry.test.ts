import { describe, it, expect, vi } from "vitest";
import {
  executeWithRetry,
  retryWhile,
  InstantDelayProvider,
} from "../../../domain/utils/retry.js";

describe("executeWithRetry", () => {
  const instantDelay = new InstantDelayProvider();

  it("should return success on first try", async () => {
    const operation = vi.fn().mockResolvedValue("success");

    const result = await executeWithRetry(operation, { maxAttempts: 3 }, instantDelay);

    expect(result).toEqual({ success: true, value: "success", attempts: 1 });
    expect(operation).toHaveBeenCalledTimes(1);
    expect(operation).toHaveBeenCalledWith(1);
  });

  it("should retry on failure and succeed", async () => {
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new Error("fail 1"))
      .mockRejectedValueOnce(new Error("fail 2"))
      .mockResolvedValue("success");

    const result = await executeWithRetry(operation, { maxAttempts: 3 }, instantDelay);

    expect(result).toEqual({ success: true, value: "success", attempts: 3 });
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it("should fail after all attempts are used", async () => {
    const operation = vi.fn().mockRejectedValue(new Error("always fails"));

    const result = await executeWithRetry(operation, { maxAttempts: 3 }, instantDelay);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe("always fails");
    }
    expect(result.attempts).toBe(3);
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it("should treat maxAttempts below 1 as a single attempt", async () => {
    const operation = vi.fn().mockRejectedValue(new Error("fail"));

    const result = await executeWithRetry(operation, { maxAttempts: 0 }, instantDelay);

    expect(result.success).toBe(false);
    expect(result.attempts).toBe(1);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("should stop early when shouldRetry rejects the error", async () => {
    const operation = vi.fn().mockRejectedValue(new Error("fatal"));

    const result = await executeWithRetry(
      operation,
      { maxAttempts: 5, shouldRetry: (error) => error.message !== "fatal" },
      instantDelay
    );

    expect(result.success).toBe(false);
    expect(result.attempts).toBe(1);
  });

  it("should wrap non-Error rejections", async () => {
    const operation = vi.fn().mockRejectedValue("boom");

    const result = await executeWithRetry(operation, { maxAttempts: 1 }, instantDelay);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(Error);
      expect(result.error.message).toBe("boom");
    }
  });

  it("should call onRetry callback with the delay used", async () => {
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new Error("fail 1"))
      .mockRejectedValueOnce(new Error("fail 2"))
      .mockResolvedValue("success");

    const onRetry = vi.fn();

    await executeWithRetry(
      operation,
      { maxAttempts: 3, baseDelayMs: 10, onRetry },
      new InstantDelayProvider()
    );

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenNthCalledWith(1, 1, expect.any(Error), 10);
    expect(onRetry).toHaveBeenNthCalledWith(2, 2, expect.any(Error), 20);
  });

  it("should use exponential backoff delays", async () => {
    const delayProvider = new InstantDelayProvider();
    const operation = vi.fn().mockRejectedValue(new Error("fail"));

    await executeWithRetry(
      operation,
      { maxAttempts: 4, baseDelayMs: 100, maxDelayMs: 300 },
      delayProvider
    );

    // No delay after the final attempt
    expect(delayProvider.delays).toEqual([100, 200, 300]);
  });
});

describe("retryWhile", () => {
  it("should return the first value that is not retryable", async () => {
    const delayProvider = new InstantDelayProvider();
    const operation = vi
      .fn()
      .mockResolvedValueOnce("retry")
      .mockResolvedValueOnce("done");

    const result = await retryWhile(
      operation,
      { maxAttempts: 5, baseDelayMs: 50, isRetryable: (value) => value === "retry" },
      delayProvider
    );

    expect(result).toEqual({ value: "done", attempts: 2 });
    expect(delayProvider.delays).toEqual([50]);
  });

  it("should return the last retryable value when attempts run out", async () => {
    const delayProvider = new InstantDelayProvider();
    const operation = vi.fn().mockResolvedValue("retry");
    const onRetry = vi.fn();

    const result = await retryWhile(
      operation,
      { maxAttempts: 3, baseDelayMs: 50, isRetryable: () => true, onRetry },
      delayProvider
    );

    expect(result).toEqual({ value: "retry", attempts: 3 });
    expect(operation).toHaveBeenNthCalledWith(3, 3);
    expect(delayProvider.delays).toEqual([50, 100]);
    expect(onRetry).toHaveBeenNthCalledWith(2, 2, "retry", 100);
  });

  it("should apply jitter from the injected random source", async () => {
    const delayProvider = new InstantDelayProvider();

    await retryWhile(
      () => Promise.resolve(false),
      {
        maxAttempts: 2,
        baseDelayMs: 100,
        jitterFactor: 1,
        random: () => 0.5,
        isRetryable: (ok) => !ok,
      },
      delayProvider
    );

    // 100 + (200 - 100) * 1 * 0.5
    expect(delayProvider.delays).toEqual([150]);
  });

  it("should propagate a thrown error without retrying", async () => {
    const operation = vi.fn().mockRejectedValue(new Error("unexpected"));

    await expect(
      retryWhile(operation, { maxAttempts: 3, isRetryable: () => true }, new InstantDelayProvider())
    ).rejects.toThrow("unexpected");
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe("InstantDelayProvider", () => {
  it("should track delay calls", async () => {
    const provider = new InstantDelayProvider();

    await provider.delay(100);
    await provider.delay(200);
    await provider.delay(300);

    expect(provider.delays).toEqual([100, 200, 300]);
  });

  it("should not actually delay", async () => {
    const provider = new InstantDelayProvider();
    const start = Date.now();

    await provider.delay(10000); // 10 seconds

    const elapsed = Date.now() - start;
    expect(elapsed).toBeLessThan(100); // Should be nearly instant
  });
});
