/**
 * errors.test.ts — Error taxonomy and classification of backend failures
 */

import { describe, it, expect } from "vitest";
import {
  AuthStateChangedError,
  CancelledError,
  DataCoreError,
  ErrorCode,
  NotAuthenticatedError,
  RetryableTransportError,
  RetryExhaustedError,
  TerminalError,
  classifyError,
  errorCodeOf,
  errorMessage,
  toCancelledError,
  toTerminalError,
} from "../src/errors.js";

function coded(code: string | number): Error {
  return Object.assign(new Error(`failed with ${code}`), { code });
}

describe("error classes", () => {
  it("carry stable codes and names", () => {
    const cases: [DataCoreError, string, string][] = [
      [new NotAuthenticatedError(), ErrorCode.NOT_AUTHENTICATED, "NotAuthenticatedError"],
      [new AuthStateChangedError(1, 2), ErrorCode.AUTH_STATE_CHANGED, "AuthStateChangedError"],
      [new CancelledError(), ErrorCode.CANCELLED, "CancelledError"],
      [new RetryableTransportError("dns", "no dns"), ErrorCode.RETRYABLE_TRANSPORT, "RetryableTransportError"],
      [new TerminalError("not-found", "gone"), ErrorCode.TERMINAL, "TerminalError"],
    ];
    for (const [err, code, name] of cases) {
      expect(err).toBeInstanceOf(DataCoreError);
      expect(err.code).toBe(code);
      expect(err.name).toBe(name);
    }
  });

  it("RetryExhaustedError is terminal and keeps the last error", () => {
    const last = coded("ECONNRESET");
    const err = new RetryExhaustedError(3, last);
    expect(err).toBeInstanceOf(TerminalError);
    expect(err.reason).toBe("exhausted");
    expect(err.cause).toBe(last);
    expect(err.message).toBe("Gave up after 3 attempts: failed with ECONNRESET");
    expect(new RetryExhaustedError(1, "x").message).toBe("Gave up after 1 attempt: x");
  });
});

describe("classifyError", () => {
  it("passes auth and cancellation errors through", () => {
    expect(classifyError(new NotAuthenticatedError())).toBe("passthrough");
    expect(classifyError(new AuthStateChangedError(0, 1))).toBe("passthrough");
    expect(classifyError(new CancelledError())).toBe("passthrough");
    const abort = new Error("aborted");
    abort.name = "AbortError";
    expect(classifyError(abort)).toBe("passthrough");
  });

  it("retries socket, DNS and canonical transport codes", () => {
    for (const code of ["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "EAI_AGAIN", "unavailable", "deadline-exceeded"]) {
      expect(classifyError(coded(code))).toBe("retryable");
    }
  });

  it("retries PostgreSQL connection and shutdown SQLSTATEs", () => {
    for (const code of ["08006", "08001", "57P01", "57014"]) {
      expect(classifyError(coded(code))).toBe("retryable");
    }
  });

  it("reads the code from the cause when the error itself has none", () => {
    const wrapped = new Error("fetch failed", { cause: coded("ECONNRESET") });
    expect(errorCodeOf(wrapped)).toBe("ECONNRESET");
    expect(classifyError(wrapped)).toBe("retryable");
  });

  it("retries timeouts raised by AbortSignal.timeout()", () => {
    const timeout = new Error("signal timed out");
    timeout.name = "TimeoutError";
    expect(classifyError(timeout)).toBe("retryable");
  });

  it("treats permission, validation and unknown failures as terminal", () => {
    expect(classifyError(coded("permission-denied"))).toBe("terminal");
    expect(classifyError(coded("23505"))).toBe("terminal");
    expect(classifyError(new Error("weird"))).toBe("terminal");
    expect(classifyError("a string")).toBe("terminal");
    expect(classifyError(new RetryExhaustedError(3, coded("ECONNRESET")))).toBe("terminal");
  });
});

describe("toTerminalError", () => {
  it("maps codes onto terminal reasons", () => {
    expect(toTerminalError(coded("not-found")).reason).toBe("not-found");
    expect(toTerminalError(coded("42501")).reason).toBe("permission-denied");
    expect(toTerminalError(coded("28P01")).reason).toBe("unauthenticated");
    expect(toTerminalError(coded("22P02")).reason).toBe("invalid-argument");
    expect(toTerminalError(coded(500)).reason).toBe("unknown");
  });

  it("returns terminal errors unchanged and wraps others as cause", () => {
    const terminal = new TerminalError("invalid-argument", "bad");
    expect(toTerminalError(terminal)).toBe(terminal);
    const raw = coded("not-found");
    expect(toTerminalError(raw).cause).toBe(raw);
    expect(toTerminalError(raw).message).toBe("failed with not-found");
  });
});

describe("helpers", () => {
  it("toCancelledError keeps a CancelledError and wraps anything else", () => {
    const cancelled = new CancelledError("stop");
    expect(toCancelledError(cancelled)).toBe(cancelled);
    const wrapped = toCancelledError("timeout");
    expect(wrapped).toBeInstanceOf(CancelledError);
    expect(wrapped.cause).toBe("timeout");
  });

  it("errorMessage handles non-errors", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(42)).toBe("42");
  });

  it("errorCodeOf stringifies numeric codes", () => {
    expect(errorCodeOf(coded(503))).toBe("503");
    expect(errorCodeOf(null)).toBeUndefined();
  });
});
