import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConsecutiveFailureBreaker } from "./consecutive-failure-breaker.js";

describe("ConsecutiveFailureBreaker", () => {
  const defaultOptions = {
    endpointKey: "device:list",
    failureThreshold: 3,
    recoveryTimeoutMs: 1000,
  };

  function tripped(options = defaultOptions): ConsecutiveFailureBreaker {
    const breaker = new ConsecutiveFailureBreaker(options);
    for (let i = 0; i < options.failureThreshold; i++) {
      breaker.recordFailure();
    }
    return breaker;
  }

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(1_700_000_000_000);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // -----------------------------------------------------------------------
  // CLOSED state
  // -----------------------------------------------------------------------

  describe("CLOSED state", () => {
    it("allows calls", () => {
      const breaker = new ConsecutiveFailureBreaker(defaultOptions);
      expect(breaker.allow()).toBe(true);
      expect(breaker.getState()).toBe("closed");
    });

    it("accumulates failures until threshold", () => {
      const breaker = new ConsecutiveFailureBreaker(defaultOptions);

      breaker.recordFailure();
      breaker.recordFailure();
      expect(breaker.getState()).toBe("closed");
      expect(breaker.allow()).toBe(true);

      breaker.recordFailure();
      expect(breaker.getState()).toBe("open");
      expect(breaker.allow()).toBe(false);
    });

    it("a success clears the consecutive failure count", () => {
      const breaker = new ConsecutiveFailureBreaker(defaultOptions);

      breaker.recordFailure();
      breaker.recordFailure();
      breaker.recordSuccess();
      breaker.recordFailure();
      breaker.recordFailure();

      expect(breaker.getState()).toBe("closed");
      expect(breaker.snapshot().failureCount).toBe(2);
    });
  });

  // -----------------------------------------------------------------------
  // OPEN state
  // -----------------------------------------------------------------------

  describe("OPEN state", () => {
    it("records openedAt and retryAt when tripping", () => {
      const breaker = tripped();
      expect(breaker.snapshot().openedAt).toBe(1_700_000_000_000);
      expect(breaker.retryAt()).toBe(1_700_000_001_000);
    });

    it("refuses calls and stays OPEN before the recovery timeout", () => {
      const breaker = tripped();

      vi.advanceTimersByTime(999);
      for (let i = 0; i < 5; i++) {
        expect(breaker.allow()).toBe(false);
      }
      expect(breaker.getState()).toBe("open");
    });

    it("admits exactly one caller once the recovery timeout elapses", () => {
      const breaker = tripped();

      vi.advanceTimersByTime(1000);
      expect(breaker.allow()).toBe(true);
      expect(breaker.getState()).toBe("half_open");
      expect(breaker.snapshot().halfOpenTrialInFlight).toBe(true);

      // Concurrent second caller during the same trial window
      expect(breaker.allow()).toBe(false);
      expect(breaker.allow()).toBe(false);
    });

    it("further failures keep it OPEN without moving openedAt", () => {
      const breaker = tripped();
      vi.advanceTimersByTime(500);
      breaker.recordFailure();

      expect(breaker.getState()).toBe("open");
      expect(breaker.snapshot().openedAt).toBe(1_700_000_000_000);
      expect(breaker.snapshot().failureCount).toBe(4);
    });
  });

  // -----------------------------------------------------------------------
  // HALF_OPEN state
  // -----------------------------------------------------------------------

  describe("HALF_OPEN state", () => {
    it("a successful trial closes the circuit", () => {
      const breaker = tripped();
      vi.advanceTimersByTime(1000);
      breaker.allow();

      breaker.recordSuccess();

      expect(breaker.getState()).toBe("closed");
      expect(breaker.snapshot()).toMatchObject({
        failureCount: 0,
        halfOpenTrialInFlight: false,
      });
      expect(breaker.allow()).toBe(true);
    });

    it("a failed trial reopens the circuit and restarts the recovery window", () => {
      const breaker = tripped();
      vi.advanceTimersByTime(1000);
      breaker.allow();

      vi.advanceTimersByTime(250);
      breaker.recordFailure();

      expect(breaker.getState()).toBe("open");
      expect(breaker.snapshot().openedAt).toBe(1_700_000_001_250);
      expect(breaker.snapshot().halfOpenTrialInFlight).toBe(false);
      expect(breaker.allow()).toBe(false);

      vi.advanceTimersByTime(1000);
      expect(breaker.allow()).toBe(true);
      expect(breaker.getState()).toBe("half_open");
    });
  });

  // -----------------------------------------------------------------------
  // Transitions and reset
  // -----------------------------------------------------------------------

  describe("state change notifications", () => {
    it("reports each transition once in order", () => {
      const onStateChange = vi.fn();
      const breaker = new ConsecutiveFailureBreaker({ ...defaultOptions, onStateChange });

      for (let i = 0; i < 3; i++) breaker.recordFailure();
      vi.advanceTimersByTime(1000);
      breaker.allow();
      breaker.allow();
      breaker.recordSuccess();

      expect(onStateChange.mock.calls).toEqual([
        ["closed", "open"],
        ["open", "half_open"],
        ["half_open", "closed"],
      ]);
    });
  });

  describe("reset", () => {
    it("returns to CLOSED and clears counters", () => {
      const breaker = tripped();

      breaker.reset();

      expect(breaker.snapshot()).toEqual({
        endpointKey: "device:list",
        state: "closed",
        failureCount: 0,
        failureThreshold: 3,
        openedAt: null,
        recoveryTimeoutMs: 1000,
        halfOpenTrialInFlight: false,
      });
      expect(breaker.retryAt()).toBeNull();
    });
  });

  describe("configuration variations", () => {
    it("respects different failure thresholds", () => {
      const breaker = new ConsecutiveFailureBreaker({ ...defaultOptions, failureThreshold: 5 });

      for (let i = 0; i < 4; i++) {
        breaker.recordFailure();
        expect(breaker.getState()).toBe("closed");
      }

      breaker.recordFailure();
      expect(breaker.getState()).toBe("open");
      expect(breaker.allow()).toBe(false);
    });
  });
});
