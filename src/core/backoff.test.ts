import { afterEach, describe, expect, it, vi } from "vitest";
import { backoffDelay, parseRetryAfter, sleep } from "./backoff.js";

const settings = { baseDelayMs: 200, maxDelayMs: 2000, factor: 2 };

describe("backoffDelay", () => {
  it("grows exponentially from the base delay", () => {
    expect([1, 2, 3, 4].map((retry) => backoffDelay(retry, settings))).toEqual([
      200, 400, 800, 1600,
    ]);
  });

  it("is capped at maxDelayMs", () => {
    expect(backoffDelay(5, settings)).toBe(2000);
    expect(backoffDelay(30, settings)).toBe(2000);
  });

  it("treats retry 0 like the first retry", () => {
    expect(backoffDelay(0, settings)).toBe(200);
  });
});

describe("sleep", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves after the delay", async () => {
    vi.useFakeTimers();
    const done = vi.fn();
    void sleep(500).then(done);

    await vi.advanceTimersByTimeAsync(499);
    expect(done).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    expect(done).toHaveBeenCalledOnce();
  });

  it("resolves early when the signal aborts", async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const done = vi.fn();
    void sleep(10_000, controller.signal).then(done);

    controller.abort();
    await vi.advanceTimersByTimeAsync(0);

    expect(done).toHaveBeenCalledOnce();
    expect(vi.getTimerCount()).toBe(0);
  });

  it("resolves immediately for an already aborted signal", async () => {
    await expect(sleep(10_000, AbortSignal.abort())).resolves.toBeUndefined();
  });
});

describe("parseRetryAfter", () => {
  it("reads delta-seconds", () => {
    expect(parseRetryAfter("120")).toBe(120_000);
    expect(parseRetryAfter(" 0 ")).toBe(0);
  });

  it("reads an HTTP date relative to now", () => {
    const now = Date.parse("Wed, 21 Oct 2026 07:28:00 GMT");
    expect(parseRetryAfter("Wed, 21 Oct 2026 07:28:30 GMT", now)).toBe(30_000);
    expect(parseRetryAfter("Wed, 21 Oct 2026 07:27:00 GMT", now)).toBe(0);
  });

  it("returns null for missing or unparseable values", () => {
    expect(parseRetryAfter(undefined)).toBeNull();
    expect(parseRetryAfter("")).toBeNull();
    expect(parseRetryAfter("soon")).toBeNull();
  });
});
