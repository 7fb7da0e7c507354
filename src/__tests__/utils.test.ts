import { describe, it, expect, vi, afterEach } from "vitest";
import { envBool, envInt, envStr } from "../core/config/env";
import { formatDuration, formatStamp } from "../core/utils/date";
import { HTTP_RETRY_OPTIONS, RetryError, withRetry } from "../core/utils/retry";

describe("env helpers", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("falls back to defaults", () => {
    vi.stubEnv("CW_TEST_UNSET", "");
    expect(envStr("CW_TEST_MISSING", "fallback")).toBe("fallback");
    expect(envInt("CW_TEST_UNSET", 7)).toBe(7);
    expect(envBool("CW_TEST_MISSING", true)).toBe(true);
  });

  it("parses set values", () => {
    vi.stubEnv("CW_TEST_INT", "42");
    vi.stubEnv("CW_TEST_BAD_INT", "many");
    vi.stubEnv("CW_TEST_BOOL", "No");
    vi.stubEnv("CW_TEST_ON", "ON");
    expect(envInt("CW_TEST_INT", 1)).toBe(42);
    expect(envInt("CW_TEST_BAD_INT", 1)).toBe(1);
    expect(envBool("CW_TEST_BOOL", true)).toBe(false);
    expect(envBool("CW_TEST_ON", false)).toBe(true);
  });

  it("uses the default for integers below the minimum", () => {
    vi.stubEnv("CW_TEST_ZERO", "0");
    vi.stubEnv("CW_TEST_NEGATIVE", "-5");
    vi.stubEnv("CW_TEST_PARTIAL", "12abc");
    expect(envInt("CW_TEST_ZERO", 3500, 1)).toBe(3500);
    expect(envInt("CW_TEST_NEGATIVE", 3500, 1)).toBe(3500);
    expect(envInt("CW_TEST_ZERO", 30, 0)).toBe(0);
    expect(envInt("CW_TEST_PARTIAL", 7)).toBe(7);
  });
});

describe("date formatting", () => {
  it("formats durations", () => {
    expect(formatDuration(0)).toBe("0s");
    expect(formatDuration(61_500)).toBe("1m1s");
    expect(formatDuration(3_600_000)).toBe("1h0m0s");
  });

  it("formats timestamps to the minute", () => {
    expect(formatStamp("2025-09-02T10:42:31.000Z")).toBe("2025-09-02 10:42");
  });
});

describe("withRetry", () => {
  const fast = { maxRetries: 2, baseDelayMs: 0, jitterMs: 0 };

  it("returns the first successful result", async () => {
    const op = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("fetch failed"))
      .mockResolvedValueOnce("done");
    const onRetry = vi.fn();

    await expect(withRetry(op, { ...fast, onRetry })).resolves.toBe("done");
    expect(op).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledWith(expect.any(Error), 1, 0);
  });

  it("gives up after the last attempt", async () => {
    const op = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("boom"));

    const error = await withRetry(op, fast).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryError);
    expect(error instanceof RetryError ? error.attempt : 0).toBe(3);
    expect(op).toHaveBeenCalledTimes(3);
  });

  it("does not retry errors the condition rejects", async () => {
    const op = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("HTTP 404 for /x"));

    await expect(
      withRetry(op, { ...fast, retryCondition: HTTP_RETRY_OPTIONS.retryCondition }),
    ).rejects.toThrow("HTTP 404 for /x");
    expect(op).toHaveBeenCalledTimes(1);
  });

  it("treats throttling and server errors as transient", () => {
    const retryable = HTTP_RETRY_OPTIONS.retryCondition ?? (() => false);
    expect(retryable(new Error("HTTP 429 for /x"))).toBe(true);
    expect(retryable(new Error("HTTP 503 for /x"))).toBe(true);
    expect(retryable(new Error("The operation was aborted due to timeout"))).toBe(true);
    expect(retryable(new Error("HTTP 404 for /x"))).toBe(false);
  });
});
