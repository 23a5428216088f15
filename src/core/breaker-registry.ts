/**
 * BreakerRegistry: one circuit breaker per logical endpoint key.
 *
 * Breakers are created lazily on first use and live for the life of the
 * process (never persisted). Thresholds come from the profile of the key's
 * family (the segment before the first ":"), or from the defaults.
 *
 * @module Resilience
 */

import { ConsecutiveFailureBreaker } from "../adapters/consecutive-failure-breaker.js";
import type {
  BreakerSnapshot,
  BreakerState,
  CircuitBreaker,
} from "../interfaces/circuit-breaker.js";
import type { Logger } from "../interfaces/logger.js";
import type { BreakerSettings } from "../types/config.js";
import { noopLogger } from "../utils/noop-logger.js";
import { TypedEventEmitter } from "./typed-emitter.js";

export interface BreakerStateChange {
  endpointKey: string;
  from: BreakerState;
  to: BreakerState;
}

export interface BreakerRegistryEvents {
  "breaker:state": BreakerStateChange;
}

export interface BreakerRegistryOptions {
  defaults: BreakerSettings;
  profiles?: Record<string, BreakerSettings>;
  logger?: Logger;
}

/** Family of an endpoint key: "device:list" → "device". */
export function endpointFamily(endpointKey: string): string {
  const separator = endpointKey.indexOf(":");
  return separator === -1 ? endpointKey : endpointKey.slice(0, separator);
}

export class BreakerRegistry extends TypedEventEmitter<BreakerRegistryEvents> {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly defaults: BreakerSettings;
  private readonly profiles: Record<string, BreakerSettings>;
  private readonly logger: Logger;

  constructor(options: BreakerRegistryOptions) {
    super();
    this.defaults = options.defaults;
    this.profiles = options.profiles ?? {};
    this.logger = options.logger ?? noopLogger;
  }

  /** Create-once: the Map lookup and insert run in one synchronous turn. */
  getOrCreate(endpointKey: string): CircuitBreaker {
    const existing = this.breakers.get(endpointKey);
    if (existing) return existing;

    const settings = this.settingsFor(endpointKey);
    const breaker = new ConsecutiveFailureBreaker({
      endpointKey,
      ...settings,
      onStateChange: (from, to) => this.handleStateChange(endpointKey, from, to),
    });
    this.breakers.set(endpointKey, breaker);
    this.logger.debug?.("Created circuit breaker", { endpointKey, ...settings });
    return breaker;
  }

  get(endpointKey: string): CircuitBreaker | undefined {
    return this.breakers.get(endpointKey);
  }

  settingsFor(endpointKey: string): BreakerSettings {
    return (
      this.profiles[endpointKey] ?? this.profiles[endpointFamily(endpointKey)] ?? this.defaults
    );
  }

  list(): CircuitBreaker[] {
    return [...this.breakers.values()];
  }

  stats(): BreakerSnapshot[] {
    return this.list().map((breaker) => breaker.snapshot());
  }

  get size(): number {
    return this.breakers.size;
  }

  /** True when at least one breaker exists and every one of them is OPEN. */
  allOpen(): boolean {
    if (this.breakers.size === 0) return false;
    for (const breaker of this.breakers.values()) {
      if (breaker.getState() !== "open") return false;
    }
    return true;
  }

  /** True when some OPEN breaker has reached its recovery time and would admit a trial. */
  recoveryDue(now = Date.now()): boolean {
    for (const breaker of this.breakers.values()) {
      const retryAt = breaker.retryAt();
      if (retryAt !== null && now >= retryAt) return true;
    }
    return false;
  }

  resetBreaker(endpointKey: string): boolean {
    const breaker = this.breakers.get(endpointKey);
    if (!breaker) return false;
    breaker.reset();
    this.logger.info("Circuit breaker reset", { endpointKey });
    return true;
  }

  /** Drop every breaker; the next call per key starts CLOSED. */
  reset(): void {
    this.breakers.clear();
    this.logger.debug?.("Circuit breaker registry cleared");
  }

  private handleStateChange(endpointKey: string, from: BreakerState, to: BreakerState): void {
    if (to === "open") {
      const snapshot = this.breakers.get(endpointKey)?.snapshot();
      this.logger.warn("Circuit opened", {
        endpointKey,
        from,
        failureCount: snapshot?.failureCount,
      });
    } else if (to === "closed") {
      this.logger.info("Circuit closed", { endpointKey, from });
    } else {
      this.logger.info("Circuit half-open, admitting trial call", { endpointKey });
    }
    this.emit("breaker:state", { endpointKey, from, to });
  }
}
