import { describe, expect, it } from "vitest";
import { OperationCancelledError } from "../../../src/errors.js";
import { LLMRateLimiter } from "../../../src/services/LLMRateLimiter.js";

describe("LLMRateLimiter", () => {
  it("retries retryable failures with exponential backoff", async () => {
    const limiter = new LLMRateLimiter({
      maxConcurrent: 1,
      maxRetries: 3,
      retryDelayMs: 1,
      requestsPerMinute: 100,
      timeoutMs: 5000
    });

    let attempt = 0;
    const result = await limiter.run(async () => {
      attempt += 1;
      if (attempt < 3) {
        throw Object.assign(new Error("temporary"), { status: 429 });
      }
      return "ok";
    });

    expect(result).toBe("ok");
    expect(attempt).toBe(3);
  });

  it("waits for the provider's Retry-After hint instead of the backoff", async () => {
    const limiter = new LLMRateLimiter({ maxRetries: 1, retryDelayMs: 60_000, timeoutMs: 5000 });

    let attempt = 0;
    const startedAt = Date.now();
    const result = await limiter.run(async () => {
      attempt += 1;
      if (attempt === 1) {
        throw Object.assign(new Error("slow down"), { status: 429, headers: { "retry-after": "0" } });
      }
      return "ok";
    });

    expect(result).toBe("ok");
    expect(attempt).toBe(2);
    expect(Date.now() - startedAt).toBeLessThan(5000);
  });

  it("does not retry client errors", async () => {
    const limiter = new LLMRateLimiter({ maxRetries: 3, retryDelayMs: 1 });

    let attempt = 0;
    await expect(
      limiter.run(async () => {
        attempt += 1;
        throw Object.assign(new Error("invalid request"), { status: 400 });
      })
    ).rejects.toThrow("invalid request");
    expect(attempt).toBe(1);
  });

  it("rejects work whose signal is already aborted", async () => {
    const limiter = new LLMRateLimiter();
    const controller = new AbortController();
    controller.abort();

    await expect(limiter.run(async () => "never", { signal: controller.signal })).rejects.toBeInstanceOf(
      OperationCancelledError
    );
  });

  it("makes a single attempt when the call opts out of retries", async () => {
    const limiter = new LLMRateLimiter({ maxRetries: 3, retryDelayMs: 1 });

    let attempt = 0;
    await expect(
      limiter.run(
        async () => {
          attempt += 1;
          throw Object.assign(new Error("temporary"), { status: 503 });
        },
        { maxRetries: 0 }
      )
    ).rejects.toThrow("temporary");
    expect(attempt).toBe(1);
  });

  it("drops queued work as soon as its signal aborts", async () => {
    const limiter = new LLMRateLimiter({ maxRetries: 0, requestsPerMinute: 1, timeoutMs: 5000 });
    await limiter.run(async () => "first");

    const controller = new AbortController();
    let started = false;
    const queued = limiter.run(
      async () => {
        started = true;
        return "second";
      },
      { signal: controller.signal }
    );
    const startedAt = Date.now();
    controller.abort();

    await expect(queued).rejects.toBeInstanceOf(OperationCancelledError);
    expect(Date.now() - startedAt).toBeLessThan(1000);
    expect(started).toBe(false);
  });

  it("honors maxConcurrent", async () => {
    const limiter = new LLMRateLimiter({
      maxConcurrent: 2,
      maxRetries: 0,
      retryDelayMs: 1,
      requestsPerMinute: 100,
      timeoutMs: 5000
    });

    let inFlight = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 6 }).map((_, idx) =>
        limiter.run(async () => {
          inFlight += 1;
          peak = Math.max(peak, inFlight);
          await new Promise((resolve) => {
            setTimeout(resolve, 20 + idx * 2);
          });
          inFlight -= 1;
          return idx;
        })
      )
    );

    expect(peak).toBeLessThanOrEqual(2);
  });
});
