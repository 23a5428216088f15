/**
 * Maps whatever an operation threw onto the call error taxonomy.
 *
 * @module Resilience
 */

import {
  AuthExpiredError,
  errorMessage,
  HttpStatusError,
  PermanentError,
  ThrottledError,
  TransientError,
  type TransientReason,
} from "../errors.js";

export type FailureClass =
  | { kind: "auth" }
  | { kind: "throttled"; retryAfterMs: number | null }
  | { kind: "transient"; reason: TransientReason }
  | { kind: "permanent"; status: number | null; message: string };

const NETWORK_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "UND_ERR_SOCKET",
  "UND_ERR_CLOSED",
]);

const TIMEOUT_CODES = new Set([
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

/** System-level network failure, looking one level into `cause` (fetch wraps them). */
function networkReason(err: Error): TransientReason | null {
  for (const candidate of [err, err.cause]) {
    const code = errorCode(candidate);
    if (code && TIMEOUT_CODES.has(code)) return "timeout";
    if (code && NETWORK_CODES.has(code)) return "network";
  }
  if (err.name === "TimeoutError") return "timeout";
  if (err.name === "AbortError") return "aborted";
  // undici reports every connection-level failure as TypeError("fetch failed")
  if (err instanceof TypeError && err.message === "fetch failed") return "network";
  return null;
}

function classifyStatus(err: HttpStatusError): FailureClass {
  const { status } = err;
  if (status === 401 || status === 403) return { kind: "auth" };
  if (status === 429) return { kind: "throttled", retryAfterMs: err.retryAfterMs };
  if (status === 408) return { kind: "transient", reason: "timeout" };
  if (status >= 500) return { kind: "transient", reason: "server" };
  return { kind: "permanent", status, message: err.message };
}

/** Anything unrecognized is permanent. */
export function classifyFailure(err: unknown): FailureClass {
  if (err instanceof HttpStatusError) return classifyStatus(err);
  if (err instanceof AuthExpiredError) return { kind: "auth" };
  if (err instanceof ThrottledError) return { kind: "throttled", retryAfterMs: err.cooldownMs };
  if (err instanceof TransientError) return { kind: "transient", reason: err.reason };
  if (err instanceof PermanentError) {
    return { kind: "permanent", status: err.status, message: err.message };
  }
  if (err instanceof Error) {
    const reason = networkReason(err);
    if (reason) return { kind: "transient", reason };
  }
  return { kind: "permanent", status: null, message: errorMessage(err) };
}

/** Transient failures worth another attempt; a caller abort is final. */
export function isRetryable(failure: FailureClass): boolean {
  return failure.kind === "transient" && failure.reason !== "aborted";
}
