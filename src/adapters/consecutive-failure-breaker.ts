import type {
  BreakerSnapshot,
  BreakerState,
  CircuitBreaker,
} from "../interfaces/circuit-breaker.js";

export interface ConsecutiveFailureBreakerOptions {
  endpointKey: string;
  failureThreshold: number; // consecutive failures that trip CLOSED → OPEN
  recoveryTimeoutMs: number; // time in OPEN before a trial is admitted
  onStateChange?: (from: BreakerState, to: BreakerState) => void;
}

/**
 * Circuit breaker driven by consecutive failures.
 *
 * CLOSED: calls pass, failures counted; any success clears the count
 * OPEN: calls refused until recoveryTimeoutMs has elapsed since openedAt
 * HALF_OPEN: exactly one trial in flight; success closes, failure reopens
 *
 * Every method runs to completion synchronously, so a check-and-claim in
 * allow() cannot interleave with another caller on the event loop.
 */
export class ConsecutiveFailureBreaker implements CircuitBreaker {
  readonly endpointKey: string;

  private state: BreakerState = "closed";
  private failureCount = 0;
  private openedAt: number | null = null;
  private trialInFlight = false;

  private readonly failureThreshold: number;
  private readonly recoveryTimeoutMs: number;
  private readonly onStateChange?: (from: BreakerState, to: BreakerState) => void;

  constructor(options: ConsecutiveFailureBreakerOptions) {
    this.endpointKey = options.endpointKey;
    this.failureThreshold = options.failureThreshold;
    this.recoveryTimeoutMs = options.recoveryTimeoutMs;
    this.onStateChange = options.onStateChange;
  }

  allow(): boolean {
    if (this.state === "closed") {
      return true;
    }

    if (this.state === "open") {
      const openedAt = this.openedAt ?? 0;
      if (Date.now() - openedAt >= this.recoveryTimeoutMs) {
        this.transition("half_open");
        this.trialInFlight = true;
        return true;
      }
      return false;
    }

    // HALF_OPEN: a single probe per recovery window
    if (this.trialInFlight) {
      return false;
    }
    this.trialInFlight = true;
    return true;
  }

  recordSuccess(): void {
    this.failureCount = 0;
    if (this.state === "half_open") {
      this.trialInFlight = false;
      this.transition("closed");
    }
  }

  recordFailure(): void {
    this.failureCount++;

    if (this.state === "half_open") {
      this.trialInFlight = false;
      this.openedAt = Date.now();
      this.transition("open");
      return;
    }

    if (this.state === "closed" && this.failureCount >= this.failureThreshold) {
      this.openedAt = Date.now();
      this.transition("open");
    }
  }

  getState(): BreakerState {
    return this.state;
  }

  retryAt(): number | null {
    if (this.state !== "open" || this.openedAt === null) return null;
    return this.openedAt + this.recoveryTimeoutMs;
  }

  snapshot(): BreakerSnapshot {
    return {
      endpointKey: this.endpointKey,
      state: this.state,
      failureCount: this.failureCount,
      failureThreshold: this.failureThreshold,
      openedAt: this.openedAt,
      recoveryTimeoutMs: this.recoveryTimeoutMs,
      halfOpenTrialInFlight: this.trialInFlight,
    };
  }

  reset(): void {
    this.failureCount = 0;
    this.openedAt = null;
    this.trialInFlight = false;
    this.transition("closed");
  }

  private transition(to: BreakerState): void {
    const from = this.state;
    if (from === to) return;
    this.state = to;
    this.onStateChange?.(from, to);
  }
}
