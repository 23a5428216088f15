export type BreakerState = "closed" | "open" | "half_open";

/** Point-in-time view of a breaker, safe to hand to callers. */
export interface BreakerSnapshot {
  endpointKey: string;
  state: BreakerState;
  failureCount: number;
  failureThreshold: number;
  /** Epoch ms of the last transition to OPEN; null when never opened. */
  openedAt: number | null;
  recoveryTimeoutMs: number;
  halfOpenTrialInFlight: boolean;
}

/**
 * Circuit breaker interface.
 * Fails fast when a remote operation keeps failing, so callers stop piling
 * requests onto an endpoint that is down.
 *
 * States: CLOSED (normal) → OPEN (failing) → HALF_OPEN (one trial) → CLOSED
 */
export interface CircuitBreaker {
  readonly endpointKey: string;

  /**
   * Check if the breaker admits a call.
   * In OPEN, the first check after the recovery timeout moves to HALF_OPEN and
   * claims the single trial slot; every other caller is refused until the
   * trial reports back.
   */
  allow(): boolean;

  /** Record a successful call: clears the failure count and closes a HALF_OPEN breaker. */
  recordSuccess(): void;

  /** Record a failed call: may trip CLOSED → OPEN, and always reopens a HALF_OPEN breaker. */
  recordFailure(): void;

  getState(): BreakerState;

  snapshot(): BreakerSnapshot;

  /** Epoch ms at which an OPEN breaker admits a trial; null unless OPEN. */
  retryAt(): number | null;

  /** Force the breaker back to CLOSED. */
  reset(): void;
}
