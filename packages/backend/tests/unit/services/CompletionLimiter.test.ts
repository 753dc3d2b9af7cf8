import { describe, expect, it } from "vitest";
import {
  CompletionAbortedError,
  CompletionLimiter,
  CompletionTimeoutError,
  isRetryableError
} from "../../../src/services/CompletionLimiter.js";

describe("CompletionLimiter", () => {
  it("retries retryable failures with exponential backoff", async () => {
    const limiter = new CompletionLimiter({
      maxConcurrent: 1,
      maxRetries: 3,
      retryDelayMs: 1,
      timeoutMs: 5000
    });

    let attempt = 0;
    const result = await limiter.run(async () => {
      attempt += 1;
      if (attempt < 3) {
        throw Object.assign(new Error("temporary"), { status: 503 });
      }
      return "ok";
    });

    expect(result).toBe("ok");
    expect(attempt).toBe(3);
  });

  it("does not retry client errors", async () => {
    const limiter = new CompletionLimiter({ maxRetries: 3, retryDelayMs: 1 });
    let attempt = 0;

    await expect(
      limiter.run(async () => {
        attempt += 1;
        throw Object.assign(new Error("bad request"), { status: 400 });
      })
    ).rejects.toThrow("bad request");
    expect(attempt).toBe(1);
  });

  it("honors maxConcurrent", async () => {
    const limiter = new CompletionLimiter({
      maxConcurrent: 2,
      maxRetries: 0,
      retryDelayMs: 1,
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

    expect(peak).toBe(2);
    expect(limiter.active).toBe(0);
  });

  it("times out a slow attempt and aborts its signal", async () => {
    const limiter = new CompletionLimiter({ maxRetries: 0, timeoutMs: 20 });
    let seen: AbortSignal | undefined;

    await expect(
      limiter.run(
        (signal) =>
          new Promise<string>(() => {
            seen = signal;
          })
      )
    ).rejects.toBeInstanceOf(CompletionTimeoutError);
    expect(seen?.aborted).toBe(true);
  });

  it("stops when the caller aborts", async () => {
    const limiter = new CompletionLimiter({ maxRetries: 2, retryDelayMs: 1, timeoutMs: 5000 });
    const controller = new AbortController();

    const pending = limiter.run(() => new Promise<string>(() => {}), controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CompletionAbortedError);
    expect(limiter.active).toBe(0);
  });

  it("classifies retryable errors", () => {
    expect(isRetryableError(Object.assign(new Error("x"), { status: 429 }))).toBe(true);
    expect(isRetryableError(Object.assign(new Error("x"), { status: 500 }))).toBe(true);
    expect(isRetryableError(Object.assign(new Error("x"), { status: 404 }))).toBe(false);
    expect(isRetryableError(Object.assign(new Error("socket"), { code: "ECONNRESET" }))).toBe(true);
    expect(isRetryableError(new Error("Request timed out"))).toBe(true);
    expect(isRetryableError(new CompletionAbortedError())).toBe(false);
    expect(isRetryableError("nope")).toBe(false);
  });
});
