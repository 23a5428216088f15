/**
 * ConnectionStateMachine: process-wide gate for outbound calls.
 *
 * Holds the health of the remote session and moves only along the transition
 * table below. The auth collaborator drives login/refresh events; the
 * dispatcher drives throttling and breaker events from call outcomes.
 *
 * @module Resilience
 */

import { StateTransitionError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { ConnectionEvent, ConnectionState } from "../types/connection.js";
import { noopLogger } from "../utils/noop-logger.js";
import { TypedEventEmitter } from "./typed-emitter.js";

type TransitionTable = Record<ConnectionEvent, Partial<Record<ConnectionState, ConnectionState>>>;

const ANY_TO_ERROR: Partial<Record<ConnectionState, ConnectionState>> = {
  disconnected: "error",
  authenticating: "error",
  authenticated: "error",
  refreshing_credentials: "error",
  rate_limited: "error",
  circuit_open: "error",
  error: "error",
};

const TRANSITIONS: TransitionTable = {
  login_attempted: { disconnected: "authenticating" },
  credentials_accepted: { authenticating: "authenticated" },
  credentials_rejected: { authenticating: "error" },
  session_restored: { disconnected: "authenticated" },
  credentials_expired: { authenticated: "refreshing_credentials" },
  refresh_succeeded: { refreshing_credentials: "authenticated" },
  refresh_failed: { refreshing_credentials: "error" },
  throttled: { authenticated: "rate_limited" },
  cooldown_elapsed: { rate_limited: "authenticated" },
  all_breakers_open: { authenticated: "circuit_open" },
  breaker_closed: { circuit_open: "authenticated" },
  breaker_recovery_due: { circuit_open: "authenticated" },
  logout: {
    authenticated: "disconnected",
    rate_limited: "disconnected",
    circuit_open: "disconnected",
  },
  fault: ANY_TO_ERROR,
  reset: { error: "disconnected" },
};

/** Target state of `event` from `from`, or null when the table has no such edge. */
export function nextConnectionState(
  from: ConnectionState,
  event: ConnectionEvent,
): ConnectionState | null {
  return TRANSITIONS[event][from] ?? null;
}

export interface ConnectionStateChange {
  from: ConnectionState;
  to: ConnectionState;
  event: ConnectionEvent;
  at: number;
}

export interface ConnectionStateEvents {
  "state:changed": ConnectionStateChange;
}

export interface ConnectionStateMachineOptions {
  logger?: Logger;
  historyLimit?: number; // default: 100
}

export class ConnectionStateMachine extends TypedEventEmitter<ConnectionStateEvents> {
  private current: ConnectionState = "disconnected";
  private changes: ConnectionStateChange[] = [];
  private cooldownTimer: ReturnType<typeof setTimeout> | null = null;
  private cooldownUntil = 0;

  private readonly logger: Logger;
  private readonly historyLimit: number;

  constructor(options: ConnectionStateMachineOptions = {}) {
    super();
    this.logger = options.logger ?? noopLogger;
    this.historyLimit = options.historyLimit ?? 100;
  }

  get state(): ConnectionState {
    return this.current;
  }

  /** Only an authenticated session may reach the cache or the network. */
  get canExecuteCommands(): boolean {
    return this.current === "authenticated";
  }

  get isErrorState(): boolean {
    return (
      this.current === "error" || this.current === "rate_limited" || this.current === "circuit_open"
    );
  }

  /** Epoch ms at which a rate-limited session becomes usable again; 0 when not throttled. */
  get rateLimitedUntil(): number {
    return this.current === "rate_limited" ? this.cooldownUntil : 0;
  }

  /** Apply `event`; throws StateTransitionError when it is not valid in the current state. */
  fire(event: ConnectionEvent): ConnectionState {
    if (!this.tryFire(event)) {
      this.logger.error("Rejected connection state transition", { from: this.current, event });
      throw new StateTransitionError(this.current, event);
    }
    return this.current;
  }

  /** Apply `event` if the table allows it; returns whether a transition happened. */
  tryFire(event: ConnectionEvent): boolean {
    const from = this.current;
    const to = nextConnectionState(from, event);
    if (to === null) return false;

    if (from === "rate_limited" && to !== "rate_limited") {
      this.clearCooldown();
    }

    this.current = to;
    const change: ConnectionStateChange = { from, to, event, at: Date.now() };
    this.changes.push(change);
    if (this.changes.length > this.historyLimit) {
      this.changes = this.changes.slice(-this.historyLimit);
    }

    this.logger.info(`Connection ${from} → ${to}`, { event });
    this.emit("state:changed", change);
    return true;
  }

  /**
   * Move to rate_limited and schedule `cooldown_elapsed`.
   * A throttle signal while already rate limited extends the cooldown when it
   * ends later than the current one. Returns false when neither applied.
   */
  enterRateLimited(cooldownMs: number): boolean {
    const until = Date.now() + cooldownMs;

    if (this.current === "rate_limited") {
      if (until <= this.cooldownUntil) return false;
      this.scheduleCooldown(until);
      this.logger.info("Rate limit cooldown extended", { cooldownMs });
      return true;
    }

    if (!this.tryFire("throttled")) return false;
    this.scheduleCooldown(until);
    return true;
  }

  /** Oldest first; at most `limit` entries. */
  history(limit = 10): ConnectionStateChange[] {
    return this.changes.slice(-limit);
  }

  /** Clear the cooldown timer so the process can exit. */
  dispose(): void {
    this.clearCooldown();
    this.removeAllListeners();
  }

  private scheduleCooldown(until: number): void {
    this.clearCooldown();
    this.cooldownUntil = until;
    this.cooldownTimer = setTimeout(
      () => {
        this.cooldownTimer = null;
        this.tryFire("cooldown_elapsed");
      },
      Math.max(0, until - Date.now()),
    );
    this.cooldownTimer.unref?.();
  }

  private clearCooldown(): void {
    if (this.cooldownTimer) {
      clearTimeout(this.cooldownTimer);
      this.cooldownTimer = null;
    }
    this.cooldownUntil = 0;
  }
}
