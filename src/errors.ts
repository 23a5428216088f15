import type { ConnectionState } from "./types/connection.js";

export class CallguardError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CallguardError";
    this.code = code;
  }
}

// ── Infrastructure errors ──

export class StorageError extends CallguardError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "STORAGE", options);
    this.name = "StorageError";
  }
}

export class StateTransitionError extends CallguardError {
  readonly from: ConnectionState;
  readonly event: string;

  constructor(from: ConnectionState, event: string) {
    super(`Invalid transition: ${event} is not allowed from ${from}`, "STATE_TRANSITION");
    this.name = "StateTransitionError";
    this.from = from;
    this.event = event;
  }
}

export class ConfigError extends CallguardError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

/** Thrown by request operations for a non-2xx response; the dispatcher classifies it. */
export class HttpStatusError extends CallguardError {
  readonly status: number;
  readonly retryAfterMs: number | null;
  readonly body: unknown;

  constructor(status: number, options: { retryAfterMs?: number | null; body?: unknown } = {}) {
    super(`Remote responded with HTTP ${status}`, "HTTP_STATUS");
    this.name = "HttpStatusError";
    this.status = status;
    this.retryAfterMs = options.retryAfterMs ?? null;
    this.body = options.body;
  }
}

// ── Call errors ──
// Every failed dispatcher call resolves to exactly one of these.

export class NotReadyError extends CallguardError {
  readonly kind = "not_ready" as const;
  readonly state: ConnectionState;

  constructor(state: ConnectionState) {
    super(`Connection is not ready (state: ${state})`, "NOT_READY");
    this.name = "NotReadyError";
    this.state = state;
  }
}

export class CircuitOpenError extends CallguardError {
  readonly kind = "circuit_open" as const;
  readonly endpointKey: string;
  /** Epoch ms at which the breaker will admit a trial call, when known. */
  readonly retryAt: number | null;

  constructor(endpointKey: string, retryAt: number | null) {
    super(`Circuit open for ${endpointKey}`, "CIRCUIT_OPEN");
    this.name = "CircuitOpenError";
    this.endpointKey = endpointKey;
    this.retryAt = retryAt;
  }
}

export class ThrottledError extends CallguardError {
  readonly kind = "throttled" as const;
  readonly cooldownMs: number;

  constructor(cooldownMs: number, options?: ErrorOptions) {
    super(`Remote is throttling requests (cooldown ${cooldownMs}ms)`, "THROTTLED", options);
    this.name = "ThrottledError";
    this.cooldownMs = cooldownMs;
  }
}

export class AuthExpiredError extends CallguardError {
  readonly kind = "auth_expired" as const;
  readonly refreshAttempted: boolean;

  constructor(refreshAttempted: boolean, options?: ErrorOptions) {
    super(
      refreshAttempted
        ? "Credentials rejected after refresh"
        : "Credentials rejected by remote",
      "AUTH_EXPIRED",
      options,
    );
    this.name = "AuthExpiredError";
    this.refreshAttempted = refreshAttempted;
  }
}

export type TransientReason = "network" | "timeout" | "server" | "aborted";

export class TransientError extends CallguardError {
  readonly kind = "transient" as const;
  readonly reason: TransientReason;
  readonly attempts: number;

  constructor(reason: TransientReason, attempts: number, options?: ErrorOptions) {
    super(`Transient failure (${reason}) after ${attempts} attempt(s)`, "TRANSIENT", options);
    this.name = "TransientError";
    this.reason = reason;
    this.attempts = attempts;
  }
}

export class PermanentError extends CallguardError {
  readonly kind = "permanent" as const;
  readonly status: number | null;

  constructor(message: string, status: number | null, options?: ErrorOptions) {
    super(message, "PERMANENT", options);
    this.name = "PermanentError";
    this.status = status;
  }
}

export type CallError =
  | NotReadyError
  | CircuitOpenError
  | ThrottledError
  | AuthExpiredError
  | TransientError
  | PermanentError;

export type CallErrorKind = CallError["kind"];

// ── Utilities ──

/** Coerce unknown thrown value to CallguardError (preserves cause chain). */
export function toCallguardError(value: unknown): CallguardError {
  if (value instanceof CallguardError) return value;
  if (value instanceof Error) return new CallguardError(value.message, "UNKNOWN", { cause: value });
  return new CallguardError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
