import { describe, expect, it } from "vitest";
import {
  AuthExpiredError,
  HttpStatusError,
  PermanentError,
  ThrottledError,
  TransientError,
} from "../errors.js";
import { classifyFailure, isRetryable } from "./failure-classifier.js";

function systemError(code: string): Error {
  return Object.assign(new Error(`connect ${code}`), { code });
}

describe("classifyFailure", () => {
  describe("HTTP status", () => {
    it.each([401, 403])("%i is an auth failure", (status) => {
      expect(classifyFailure(new HttpStatusError(status))).toEqual({ kind: "auth" });
    });

    it("429 is throttling with the Retry-After delay", () => {
      expect(classifyFailure(new HttpStatusError(429, { retryAfterMs: 5000 }))).toEqual({
        kind: "throttled",
        retryAfterMs: 5000,
      });
      expect(classifyFailure(new HttpStatusError(429))).toEqual({
        kind: "throttled",
        retryAfterMs: null,
      });
    });

    it.each([500, 502, 503, 504])("%i is a transient server failure", (status) => {
      expect(classifyFailure(new HttpStatusError(status))).toEqual({
        kind: "transient",
        reason: "server",
      });
    });

    it("408 is a transient timeout", () => {
      expect(classifyFailure(new HttpStatusError(408))).toEqual({
        kind: "transient",
        reason: "timeout",
      });
    });

    it.each([400, 404, 409, 422])("%i is permanent", (status) => {
      expect(classifyFailure(new HttpStatusError(status))).toEqual({
        kind: "permanent",
        status,
        message: `Remote responded with HTTP ${status}`,
      });
    });
  });

  describe("network errors", () => {
    it.each(["ECONNRESET", "ECONNREFUSED", "ENOTFOUND", "EAI_AGAIN"])("%s is network", (code) => {
      expect(classifyFailure(systemError(code))).toEqual({ kind: "transient", reason: "network" });
    });

    it("ETIMEDOUT is a timeout", () => {
      expect(classifyFailure(systemError("ETIMEDOUT"))).toEqual({
        kind: "transient",
        reason: "timeout",
      });
    });

    it("looks into the cause of a fetch failure", () => {
      const err = new TypeError("fetch failed", { cause: systemError("UND_ERR_CONNECT_TIMEOUT") });
      expect(classifyFailure(err)).toEqual({ kind: "transient", reason: "timeout" });
    });

    it("treats a bare fetch failure as network", () => {
      expect(classifyFailure(new TypeError("fetch failed"))).toEqual({
        kind: "transient",
        reason: "network",
      });
    });

    it("maps DOMException names", () => {
      expect(classifyFailure(new DOMException("late", "TimeoutError"))).toEqual({
        kind: "transient",
        reason: "timeout",
      });
      expect(classifyFailure(new DOMException("stop", "AbortError"))).toEqual({
        kind: "transient",
        reason: "aborted",
      });
    });
  });

  describe("call errors thrown by the operation", () => {
    it("keep their meaning", () => {
      expect(classifyFailure(new AuthExpiredError(false))).toEqual({ kind: "auth" });
      expect(classifyFailure(new ThrottledError(1000))).toEqual({
        kind: "throttled",
        retryAfterMs: 1000,
      });
      expect(classifyFailure(new TransientError("server", 1))).toEqual({
        kind: "transient",
        reason: "server",
      });
      expect(classifyFailure(new PermanentError("bad payload", 400))).toEqual({
        kind: "permanent",
        status: 400,
        message: "bad payload",
      });
    });
  });

  it("classifies anything else as permanent", () => {
    expect(classifyFailure(new RangeError("bad index"))).toEqual({
      kind: "permanent",
      status: null,
      message: "bad index",
    });
    expect(classifyFailure("boom")).toEqual({ kind: "permanent", status: null, message: "boom" });
  });
});

describe("isRetryable", () => {
  it("retries transient failures except caller aborts", () => {
    expect(isRetryable({ kind: "transient", reason: "network" })).toBe(true);
    expect(isRetryable({ kind: "transient", reason: "timeout" })).toBe(true);
    expect(isRetryable({ kind: "transient", reason: "server" })).toBe(true);
    expect(isRetryable({ kind: "transient", reason: "aborted" })).toBe(false);
    expect(isRetryable({ kind: "auth" })).toBe(false);
    expect(isRetryable({ kind: "permanent", status: 400, message: "x" })).toBe(false);
  });
});
