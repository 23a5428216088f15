import { describe, expect, it } from "vitest";
import {
  AuthExpiredError,
  type CallError,
  CallguardError,
  CircuitOpenError,
  errorMessage,
  HttpStatusError,
  NotReadyError,
  PermanentError,
  StateTransitionError,
  StorageError,
  ThrottledError,
  toCallguardError,
  TransientError,
} from "./errors.js";

describe("CallguardError hierarchy", () => {
  it("CallguardError is an Error with code", () => {
    const err = new CallguardError("test", "TEST_ERROR");
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("CallguardError");
    expect(err.code).toBe("TEST_ERROR");
    expect(err.message).toBe("test");
  });

  it("infrastructure errors have correct codes and extend CallguardError", () => {
    const storage = new StorageError("write failed");
    expect(storage).toBeInstanceOf(CallguardError);
    expect(storage.code).toBe("STORAGE");
    expect(storage.name).toBe("StorageError");

    const transition = new StateTransitionError("disconnected", "refresh_succeeded");
    expect(transition.code).toBe("STATE_TRANSITION");
    expect(transition.message).toBe(
      "Invalid transition: refresh_succeeded is not allowed from disconnected",
    );
  });

  it("preserves cause chain", () => {
    const cause = new Error("original");
    const err = new StorageError("write failed", { cause });
    expect(err.cause).toBe(cause);
  });

  it("HttpStatusError defaults to no Retry-After", () => {
    const err = new HttpStatusError(503);
    expect(err.message).toBe("Remote responded with HTTP 503");
    expect(err.retryAfterMs).toBeNull();
    expect(err.body).toBeUndefined();
  });
});

describe("call errors", () => {
  const errors: CallError[] = [
    new NotReadyError("authenticating"),
    new CircuitOpenError("device:list", 1_030_000),
    new ThrottledError(5000),
    new AuthExpiredError(true),
    new TransientError("timeout", 3),
    new PermanentError("Not found", 404),
  ];

  it("carry a distinct kind discriminant", () => {
    expect(errors.map((err) => err.kind)).toEqual([
      "not_ready",
      "circuit_open",
      "throttled",
      "auth_expired",
      "transient",
      "permanent",
    ]);
  });

  it("narrow on kind", () => {
    const describe = (err: CallError): string => {
      switch (err.kind) {
        case "not_ready":
          return err.state;
        case "circuit_open":
          return `${err.endpointKey}@${err.retryAt}`;
        case "throttled":
          return String(err.cooldownMs);
        case "auth_expired":
          return String(err.refreshAttempted);
        case "transient":
          return `${err.reason}x${err.attempts}`;
        case "permanent":
          return String(err.status);
      }
    };
    expect(errors.map(describe)).toEqual([
      "authenticating",
      "device:list@1030000",
      "5000",
      "true",
      "timeoutx3",
      "404",
    ]);
  });

  it("describe whether a refresh was attempted", () => {
    expect(new AuthExpiredError(false).message).toBe("Credentials rejected by remote");
    expect(new AuthExpiredError(true).message).toBe("Credentials rejected after refresh");
  });
});

describe("toCallguardError", () => {
  it("passes through CallguardError unchanged", () => {
    const err = new CallguardError("x", "X");
    expect(toCallguardError(err)).toBe(err);
  });

  it("wraps plain Error with cause chain", () => {
    const plain = new Error("plain");
    const wrapped = toCallguardError(plain);
    expect(wrapped).toBeInstanceOf(CallguardError);
    expect(wrapped.code).toBe("UNKNOWN");
    expect(wrapped.message).toBe("plain");
    expect(wrapped.cause).toBe(plain);
  });

  it("wraps non-Error values", () => {
    expect(toCallguardError("string error").message).toBe("string error");
    expect(toCallguardError(42).message).toBe("42");
    expect(toCallguardError(null).message).toBe("Unknown error");
    expect(toCallguardError(undefined).message).toBe("Unknown error");
  });
});

describe("errorMessage", () => {
  it("extracts message from Error instances", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(new CallguardError("typed", "T"))).toBe("typed");
  });

  it("stringifies non-Error values", () => {
    expect(errorMessage("string error")).toBe("string error");
    expect(errorMessage(42)).toBe("42");
    expect(errorMessage(null)).toBe("Unknown error");
    expect(errorMessage(undefined)).toBe("Unknown error");
  });
});
