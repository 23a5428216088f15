/**
 * CallDispatcher: the single path every outbound remote call takes.
 *
 * For each call: gate on the connection state, try the cache, ask the
 * endpoint's breaker, then run the operation under a timeout with bounded
 * retries. Every failure updates breaker accounting once and resolves to a
 * typed CallOutcome; nothing is thrown for a remote fault.
 *
 * @module Resilience
 */

import {
  AuthExpiredError,
  type CallError,
  CircuitOpenError,
  ConfigError,
  NotReadyError,
  PermanentError,
  ThrottledError,
  TransientError,
} from "../errors.js";
import type { CircuitBreaker } from "../interfaces/circuit-breaker.js";
import type { Logger } from "../interfaces/logger.js";
import type { CacheEntry, CachePolicy } from "../types/cache.js";
import type { CachedCallDescriptor, CallDescriptor, CallOutcome } from "../types/call.js";
import type { ResolvedConfig } from "../types/config.js";
import { noopLogger } from "../utils/noop-logger.js";
import { backoffDelay, sleep } from "./backoff.js";
import type { BreakerRegistry, BreakerStateChange } from "./breaker-registry.js";
import type { CacheStore } from "./cache-store.js";
import type { ConnectionStateMachine } from "./connection-state-machine.js";
import { classifyFailure, type FailureClass, isRetryable } from "./failure-classifier.js";

/** Obtains fresh credentials after the remote rejects the current ones. */
export interface CredentialRefresher {
  refresh(): Promise<boolean>;
}

export type DispatcherConfig = Pick<
  ResolvedConfig,
  "retry" | "requestTimeoutMs" | "throttleCooldownMs"
> & {
  cache: Pick<ResolvedConfig["cache"], "policies">;
};

export interface CallDispatcherOptions {
  cache: CacheStore;
  breakers: BreakerRegistry;
  connection: ConnectionStateMachine;
  credentials: CredentialRefresher;
  config: DispatcherConfig;
  logger?: Logger;
}

type AttemptResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: FailureClass; cause: unknown };

type RefreshResult = "refreshed" | "failed" | "skipped";

const DEFAULT_POLICY_NAME = "default";

export class CallDispatcher {
  private readonly cacheStore: CacheStore;
  private readonly registry: BreakerRegistry;
  private readonly machine: ConnectionStateMachine;
  private readonly credentials: CredentialRefresher;
  private readonly config: DispatcherConfig;
  private readonly logger: Logger;
  private refreshing: Promise<RefreshResult> | null = null;

  private readonly onBreakerState = ({ to }: BreakerStateChange): void => {
    if (to === "closed" && this.machine.state === "circuit_open") {
      this.machine.tryFire("breaker_closed");
    }
  };

  constructor(options: CallDispatcherOptions) {
    this.cacheStore = options.cache;
    this.registry = options.breakers;
    this.machine = options.connection;
    this.credentials = options.credentials;
    this.config = options.config;
    this.logger = options.logger ?? noopLogger;
    this.registry.on("breaker:state", this.onBreakerState);
  }

  get cache(): CacheStore {
    return this.cacheStore;
  }

  get breakers(): BreakerRegistry {
    return this.registry;
  }

  get connection(): ConnectionStateMachine {
    return this.machine;
  }

  /** Readiness probe: true only while the session is authenticated. */
  get isReady(): boolean {
    return this.machine.canExecuteCommands;
  }

  async execute<T>(call: CallDescriptor<T>): Promise<CallOutcome<T>> {
    const { endpointKey } = call;
    const policy = call.cacheKey === undefined ? null : this.resolvePolicy(call.cachePolicy);

    if (this.machine.state === "circuit_open" && this.registry.recoveryDue()) {
      this.machine.tryFire("breaker_recovery_due");
    }
    if (!this.machine.canExecuteCommands) {
      return { ok: false, error: new NotReadyError(this.machine.state) };
    }
    if (call.signal?.aborted) {
      return { ok: false, error: new TransientError("aborted", 0, { cause: call.signal.reason }) };
    }

    if (call.cacheKey !== undefined && !call.forceRefresh) {
      const cached = await this.readCache(call);
      if (cached.hit) return { ok: true, value: cached.value, source: "cache" };
    }

    const breaker = this.registry.getOrCreate(endpointKey);
    if (!breaker.allow()) {
      this.logger.debug?.("Call rejected by open circuit", { endpointKey });
      if (this.registry.allOpen()) this.machine.tryFire("all_breakers_open");
      return this.fail(call, new CircuitOpenError(endpointKey, breaker.retryAt()));
    }

    // A half-open breaker admits exactly one request per recovery window
    const trial = breaker.getState() === "half_open";
    return this.invoke(call, breaker, policy, trial);
  }

  /** Remove cached entries for a resource family after a mutation made outside `execute`. */
  invalidate(prefix: string): Promise<number> {
    return this.cacheStore.invalidate(prefix);
  }

  dispose(): void {
    this.registry.off("breaker:state", this.onBreakerState);
  }

  private resolvePolicy(policy: CachePolicy | string | undefined): CachePolicy {
    if (typeof policy === "object") return policy;
    const name = policy ?? DEFAULT_POLICY_NAME;
    const named = this.config.cache.policies[name];
    if (!named) throw new ConfigError(`Unknown cache policy "${name}"`);
    return named;
  }

  private async invoke<T>(
    call: CallDescriptor<T>,
    breaker: CircuitBreaker,
    policy: CachePolicy | null,
    trial: boolean,
  ): Promise<CallOutcome<T>> {
    const { endpointKey } = call;
    const { retry } = this.config;
    let attempts = 0;
    let refresh: RefreshResult | null = null;

    for (;;) {
      attempts++;
      const result = await this.attempt(call);

      if (result.ok) {
        breaker.recordSuccess();
        await this.afterSuccess(call, result.value, policy);
        return { ok: true, value: result.value, source: "live" };
      }

      const { failure, cause } = result;
      if (isRetryable(failure) && attempts < retry.maxAttempts && !trial) {
        const delayMs = backoffDelay(attempts, retry);
        this.logger.debug?.("Retrying transient failure", { endpointKey, attempts, delayMs });
        await sleep(delayMs, call.signal);
        if (call.signal?.aborted) {
          breaker.recordFailure();
          return this.fail(call, new TransientError("aborted", attempts, { cause }));
        }
        // Another call may have throttled or faulted the connection meanwhile
        if (!this.machine.canExecuteCommands) {
          breaker.recordFailure();
          this.logger.warn("Connection not ready after backoff, giving up", {
            endpointKey,
            attempts,
            state: this.machine.state,
          });
          return this.fail(call, this.notReadyError());
        }
        continue;
      }

      if (failure.kind === "auth" && refresh === null) {
        refresh = await this.refreshCredentials();
        if (refresh === "refreshed" && !trial) {
          this.logger.info("Retrying after credential refresh", { endpointKey });
          continue;
        }
      }

      breaker.recordFailure();
      const refreshAttempted = refresh === "refreshed" || refresh === "failed";
      const error = this.toCallError(failure, attempts, refreshAttempted, cause);
      if (error instanceof ThrottledError) {
        this.machine.enterRateLimited(error.cooldownMs);
      }
      if (this.registry.allOpen()) this.machine.tryFire("all_breakers_open");

      this.logger.warn("Call failed", { endpointKey, kind: error.kind, attempts, error: cause });
      return this.fail(call, error);
    }
  }

  /**
   * One run of the operation under the call's timeout and caller signal.
   * Whichever settles first wins; an operation that ignores its signal is left
   * behind with its result discarded.
   */
  private async attempt<T>(call: CallDescriptor<T>): Promise<AttemptResult<T>> {
    const timeoutMs = call.timeoutMs ?? this.config.requestTimeoutMs;
    const controller = new AbortController();
    const callerSignal = call.signal;
    let settle: (result: AttemptResult<T>) => void = () => {};
    const abandoned = new Promise<AttemptResult<T>>((resolve) => {
      settle = resolve;
    });

    const timer = setTimeout(() => {
      const cause = new Error(`Operation timed out after ${timeoutMs}ms`);
      controller.abort(cause);
      settle({ ok: false, failure: { kind: "transient", reason: "timeout" }, cause });
    }, timeoutMs);
    const onCallerAbort = () => {
      controller.abort(callerSignal?.reason);
      settle({
        ok: false,
        failure: { kind: "transient", reason: "aborted" },
        cause: callerSignal?.reason,
      });
    };
    callerSignal?.addEventListener("abort", onCallerAbort, { once: true });

    const run = Promise.resolve()
      .then(() => call.operation(controller.signal))
      .then(
        (value): AttemptResult<T> => ({ ok: true, value }),
        (cause: unknown): AttemptResult<T> => ({
          ok: false,
          failure: classifyFailure(cause),
          cause,
        }),
      );

    try {
      return await Promise.race([run, abandoned]);
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener("abort", onCallerAbort);
    }
  }

  private async afterSuccess<T>(
    call: CallDescriptor<T>,
    value: T,
    policy: CachePolicy | null,
  ): Promise<void> {
    // Invalidate before writing so an overlapping prefix cannot drop the fresh entry
    for (const prefix of call.invalidates ?? []) {
      await this.cacheStore.invalidate(prefix);
    }
    if (call.cacheKey !== undefined && policy) {
      const written = await this.cacheStore.put(call.cacheKey, value, policy);
      if (!written.ok) {
        this.logger.warn("Could not cache call result", {
          endpointKey: call.endpointKey,
          cacheKey: call.cacheKey,
          error: written.error,
        });
      }
    }
  }

  /** One refresh at a time; concurrent auth failures share its result. */
  private refreshCredentials(): Promise<RefreshResult> {
    if (!this.refreshing) {
      this.refreshing = this.runRefresh().finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  private async runRefresh(): Promise<RefreshResult> {
    if (!this.machine.tryFire("credentials_expired")) {
      this.logger.warn("Credentials rejected while not authenticated, skipping refresh", {
        state: this.machine.state,
      });
      return "skipped";
    }

    let refreshed = false;
    try {
      refreshed = await this.credentials.refresh();
    } catch (err) {
      this.logger.error("Credential refresh threw", { error: err });
    }
    this.machine.tryFire(refreshed ? "refresh_succeeded" : "refresh_failed");
    return refreshed ? "refreshed" : "failed";
  }

  /** Rate limiting surfaces as throttled with the cooldown left; anything else as not ready. */
  private notReadyError(): CallError {
    if (this.machine.state === "rate_limited") {
      return new ThrottledError(Math.max(0, this.machine.rateLimitedUntil - Date.now()));
    }
    return new NotReadyError(this.machine.state);
  }

  private toCallError(
    failure: FailureClass,
    attempts: number,
    refreshAttempted: boolean,
    cause: unknown,
  ): CallError {
    switch (failure.kind) {
      case "auth":
        return new AuthExpiredError(refreshAttempted, { cause });
      case "throttled":
        return new ThrottledError(failure.retryAfterMs ?? this.config.throttleCooldownMs, {
          cause,
        });
      case "transient":
        return new TransientError(failure.reason, attempts, { cause });
      case "permanent":
        return new PermanentError(failure.message, failure.status, { cause });
    }
  }

  /** Outage failures carry the stale persistent entry, when there is one. */
  private async fail<T>(call: CallDescriptor<T>, error: CallError): Promise<CallOutcome<T>> {
    const outage =
      error.kind === "circuit_open" || error.kind === "throttled" || error.kind === "transient";
    if (!outage || call.cacheKey === undefined) return { ok: false, error };

    const stale = await this.cacheStore.getStale(call.cacheKey);
    const fallback = stale ? this.decodeEntry(call, stale) : null;
    return fallback ? { ok: false, error, fallback } : { ok: false, error };
  }

  private async readCache<T>(
    call: CachedCallDescriptor<T>,
  ): Promise<{ hit: true; value: T } | { hit: false }> {
    const lookup = await this.cacheStore.get(call.cacheKey);
    if (!lookup.hit) return { hit: false };
    const entry = this.decodeEntry(call, lookup.entry);
    return entry ? { hit: true, value: entry.value } : { hit: false };
  }

  private decodeEntry<T>(call: CachedCallDescriptor<T>, entry: CacheEntry): CacheEntry<T> | null {
    try {
      return { ...entry, value: call.decode(entry.value) };
    } catch (err) {
      this.logger.warn("Cached value failed to decode, ignoring", {
        cacheKey: call.cacheKey,
        error: err,
      });
      return null;
    }
  }
}
