/**
 * Unit tests for timeout and retry helpers.
 */

import { backoffDelay, isRetryableError, withRetry, withTimeout } from "../../../src/pipeline/resilience";
import { ServiceError, TimeoutError } from "../../../src/errors";

describe("withTimeout", () => {
  it("resolves when the promise settles in time", async () => {
    await expect(withTimeout(Promise.resolve(7), 50, "LLM")).resolves.toBe(7);
  });

  it("rejects with a TimeoutError naming the call", async () => {
    const never = new Promise<number>(() => undefined);
    const p = withTimeout(never, 10, "LLM");
    await expect(p).rejects.toBeInstanceOf(TimeoutError);
    await expect(p).rejects.toThrow("LLM timeout after 10ms");
  });
});

describe("backoffDelay", () => {
  it("doubles per attempt up to the cap", () => {
    expect(backoffDelay(0, 100)).toBe(100);
    expect(backoffDelay(3, 100)).toBe(800);
    expect(backoffDelay(10, 100, 5000)).toBe(5000);
  });
});

describe("isRetryableError", () => {
  it("classifies by status", () => {
    expect(isRetryableError({ status: 401 })).toBe(false);
    expect(isRetryableError({ status: 403 })).toBe(false);
    expect(isRetryableError({ status: 400 })).toBe(false);
    expect(isRetryableError({ status: 429 })).toBe(true);
    expect(isRetryableError({ status: 503 })).toBe(true);
    expect(isRetryableError(new Error("socket hang up"))).toBe(true);
  });

  it("honors the ServiceError flag", () => {
    expect(isRetryableError(new ServiceError("asr", "bad audio", { retryable: false }))).toBe(false);
    expect(isRetryableError(new ServiceError("asr", "busy", { status: 503 }))).toBe(true);
  });
});

describe("withRetry", () => {
  it("retries with backoff and returns the first success", async () => {
    const delays: number[] = [];
    let calls = 0;
    const result = await withRetry(
      async () => {
        calls += 1;
        if (calls < 3) throw new Error("flaky");
        return "ok";
      },
      { attempts: 3, baseDelayMs: 10, sleep: async (ms) => void delays.push(ms) }
    );
    expect(result).toBe("ok");
    expect(delays).toEqual([10, 20]);
  });

  it("stops at the first authentication error", async () => {
    let calls = 0;
    const denied = Object.assign(new Error("denied"), { status: 401 });
    await expect(
      withRetry(
        async () => {
          calls += 1;
          throw denied;
        },
        { attempts: 5, baseDelayMs: 1, sleep: async () => undefined }
      )
    ).rejects.toBe(denied);
    expect(calls).toBe(1);
  });

  it("rethrows the last error after the final attempt", async () => {
    let calls = 0;
    await expect(
      withRetry(
        async (attempt) => {
          calls += 1;
          throw new Error(`fail ${attempt}`);
        },
        { attempts: 2, baseDelayMs: 1, sleep: async () => undefined }
      )
    ).rejects.toThrow("fail 1");
    expect(calls).toBe(2);
  });
});
