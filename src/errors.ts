/**
 * errors.ts — Error taxonomy and transport error classification
 *
 * Every failure the data core surfaces is a DataCoreError with a stable
 * machine-readable code:
 *
 *   NotAuthenticatedError   — no signed-in identity
 *   AuthStateChangedError   — identity changed while the work was running
 *   CancelledError          — fetch cancelled (cache cleared, sign-out, teardown)
 *   RetryableTransportError — connectivity, timeout, DNS
 *   TerminalError           — permission, not-found, invalid, unauthenticated, exhausted
 *   CacheMissError          — internal only; absorbed by readThrough
 *
 * classifyError() maps raw backend errors (Node sockets, pg SQLSTATE,
 * document-store canonical codes) onto retryable / terminal / passthrough.
 */

// ─── Error Codes (stable, machine-readable) ─────────────────────

export const ErrorCode = {
  NOT_AUTHENTICATED: "NOT_AUTHENTICATED",
  AUTH_STATE_CHANGED: "AUTH_STATE_CHANGED",
  CANCELLED: "CANCELLED",
  RETRYABLE_TRANSPORT: "RETRYABLE_TRANSPORT",
  TERMINAL: "TERMINAL",
  CACHE_MISS: "CACHE_MISS",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export type RetryableReason = "connectivity" | "timeout" | "dns" | "unavailable";

export type TerminalReason =
  | "permission-denied"
  | "not-found"
  | "invalid-argument"
  | "unauthenticated"
  | "exhausted"
  | "unknown";

export type ErrorClass = "retryable" | "terminal" | "passthrough";

// ─── Error Classes ──────────────────────────────────────────────

export class DataCoreError extends Error {
  override readonly name: string = "DataCoreError";
  readonly code: ErrorCodeValue;

  constructor(code: ErrorCodeValue, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
  }
}

export class NotAuthenticatedError extends DataCoreError {
  override readonly name = "NotAuthenticatedError";

  constructor(message = "No signed-in identity") {
    super(ErrorCode.NOT_AUTHENTICATED, message);
  }
}

export class AuthStateChangedError extends DataCoreError {
  override readonly name = "AuthStateChangedError";
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(
      ErrorCode.AUTH_STATE_CHANGED,
      `Identity changed during operation (generation ${expected} → ${actual})`,
    );
    this.expected = expected;
    this.actual = actual;
  }
}

export class CancelledError extends DataCoreError {
  override readonly name = "CancelledError";

  constructor(message = "Operation cancelled", options?: { cause?: unknown }) {
    super(ErrorCode.CANCELLED, message, options);
  }
}

export class RetryableTransportError extends DataCoreError {
  override readonly name = "RetryableTransportError";
  readonly reason: RetryableReason;

  constructor(reason: RetryableReason, message: string, options?: { cause?: unknown }) {
    super(ErrorCode.RETRYABLE_TRANSPORT, message, options);
    this.reason = reason;
  }
}

export class TerminalError extends DataCoreError {
  override readonly name: string = "TerminalError";
  readonly reason: TerminalReason;

  constructor(reason: TerminalReason, message: string, options?: { cause?: unknown }) {
    super(ErrorCode.TERMINAL, message, options);
    this.reason = reason;
  }
}

/** Retryable failures that ran out of attempts or time. `cause` is the last error. */
export class RetryExhaustedError extends TerminalError {
  override readonly name = "RetryExhaustedError";
  readonly attempts: number;

  constructor(attempts: number, lastError: unknown) {
    super(
      "exhausted",
      `Gave up after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${errorMessage(lastError)}`,
      { cause: lastError },
    );
    this.attempts = attempts;
  }
}

/** Internal: thrown by TtlCache.require() and absorbed by the dispatcher. */
export class CacheMissError extends DataCoreError {
  override readonly name = "CacheMissError";
  readonly key: string;

  constructor(key: string) {
    super(ErrorCode.CACHE_MISS, `Cache miss: ${key}`);
    this.key = key;
  }
}

// ─── Classification ─────────────────────────────────────────────

const RETRYABLE_CODES: ReadonlyMap<string, RetryableReason> = new Map<string, RetryableReason>([
  // Node sockets / DNS
  ["ECONNREFUSED", "connectivity"],
  ["ECONNRESET", "connectivity"],
  ["EHOSTUNREACH", "connectivity"],
  ["ENETUNREACH", "connectivity"],
  ["EPIPE", "connectivity"],
  ["ETIMEDOUT", "timeout"],
  ["UND_ERR_CONNECT_TIMEOUT", "timeout"],
  ["ENOTFOUND", "dns"],
  ["EAI_AGAIN", "dns"],
  // Document-store canonical codes
  ["unavailable", "unavailable"],
  ["deadline-exceeded", "timeout"],
  // PostgreSQL: operator intervention / statement timeout
  ["57P01", "unavailable"],
  ["57P02", "unavailable"],
  ["57P03", "unavailable"],
  ["57014", "timeout"],
]);

const TERMINAL_CODES: ReadonlyMap<string, TerminalReason> = new Map<string, TerminalReason>([
  ["permission-denied", "permission-denied"],
  ["not-found", "not-found"],
  ["invalid-argument", "invalid-argument"],
  ["unauthenticated", "unauthenticated"],
  ["42501", "permission-denied"],
]);

/** The `code` of an error, or of its direct cause (fetch wraps socket errors). */
export function errorCodeOf(err: unknown): string | undefined {
  const own = readCode(err);
  if (own !== undefined) return own;
  if (err instanceof Error) return readCode(err.cause);
  return undefined;
}

function readCode(value: unknown): string | undefined {
  if (typeof value !== "object" || value === null || !("code" in value)) return undefined;
  const code = value.code;
  if (typeof code === "string") return code;
  if (typeof code === "number") return String(code);
  return undefined;
}

function retryableReasonOf(err: unknown): RetryableReason | undefined {
  if (err instanceof RetryableTransportError) return err.reason;
  if (err instanceof Error && err.name === "TimeoutError") return "timeout";
  const code = errorCodeOf(err);
  if (code === undefined) return undefined;
  const mapped = RETRYABLE_CODES.get(code);
  if (mapped) return mapped;
  // SQLSTATE class 08 — connection exception
  if (/^08[0-9A-Z]{3}$/.test(code)) return "connectivity";
  return undefined;
}

function terminalReasonOf(err: unknown): TerminalReason {
  if (err instanceof TerminalError) return err.reason;
  const code = errorCodeOf(err);
  if (code === undefined) return "unknown";
  const mapped = TERMINAL_CODES.get(code);
  if (mapped) return mapped;
  if (/^28[0-9A-Z]{3}$/.test(code)) return "unauthenticated";
  if (/^2[23][0-9A-Z]{3}$/.test(code)) return "invalid-argument";
  return "unknown";
}

/**
 * Classify a failure for the retry executor.
 *
 * Auth and cancellation errors pass through untouched; transport failures
 * are retried; everything else, unknown errors included, is terminal.
 */
export function classifyError(err: unknown): ErrorClass {
  if (
    err instanceof NotAuthenticatedError ||
    err instanceof AuthStateChangedError ||
    err instanceof CancelledError ||
    (err instanceof Error && err.name === "AbortError")
  ) {
    return "passthrough";
  }
  if (err instanceof TerminalError) return "terminal";
  return retryableReasonOf(err) !== undefined ? "retryable" : "terminal";
}

/** Wrap a raw terminal failure, keeping it as `cause`. */
export function toTerminalError(err: unknown): TerminalError {
  if (err instanceof TerminalError) return err;
  return new TerminalError(terminalReasonOf(err), errorMessage(err), { cause: err });
}

/** An abort reason as a CancelledError. */
export function toCancelledError(reason: unknown): CancelledError {
  if (reason instanceof CancelledError) return reason;
  return new CancelledError("Operation cancelled", { cause: reason });
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
