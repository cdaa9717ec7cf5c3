/**
 * retry.ts — Retry/backoff combinator with a hard total deadline.
 *
 * Retryable (connectivity, timeout, DNS) failures are retried with
 * exponential backoff: sleep min(base × 2^attempt, remaining budget).
 * Terminal failures surface after one attempt as TerminalError.
 * Auth and cancellation errors pass through untouched.
 * Exhausting attempts or the budget raises RetryExhaustedError whose
 * `cause` is the last observed error.
 *
 * Each attempt races the remaining budget, so a hung call cannot hold
 * the caller past totalTimeoutMs.
 */

import {
  RetryableTransportError,
  RetryExhaustedError,
  classifyError,
  errorCodeOf,
  toCancelledError,
  toTerminalError,
} from "../errors.js";
import { log } from "../logger.js";

// ─── Types ──────────────────────────────────────────────────

/** The operation receives its 0-based attempt number. */
export type RetryOperation<T> = (attempt: number) => Promise<T>;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
  maxAttempts?: number;
  totalTimeoutMs?: number;
  baseDelayMs?: number;
  /** Included in log lines */
  label?: string;
  /** Abort between attempts and during backoff sleeps */
  signal?: AbortSignal;
  now?: () => number;
  sleep?: Sleep;
}

export interface RetryExecutor {
  execute<T>(op: RetryOperation<T>, options?: RetryOptions): Promise<T>;
}

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_TOTAL_TIMEOUT_MS = 15_000;
export const DEFAULT_BASE_DELAY_MS = 1_000;

// ─── Timing ─────────────────────────────────────────────────

export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(toCancelledError(signal.reason));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(toCancelledError(signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/** Reject with a retryable timeout if the promise outlives `ms`. */
function withDeadline<T>(promise: Promise<T>, ms: number, label: string | undefined): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new RetryableTransportError("timeout", `${label ?? "operation"} exceeded ${ms}ms budget`));
    }, ms);
  });
  return Promise.race([promise, deadline]).finally(() => clearTimeout(timer));
}

// ─── Combinator ─────────────────────────────────────────────

export async function withRetry<T>(op: RetryOperation<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const totalTimeoutMs = options.totalTimeoutMs ?? DEFAULT_TOTAL_TIMEOUT_MS;
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const now = options.now ?? Date.now;
  const wait = options.sleep ?? sleep;
  const { label, signal } = options;

  const start = now();
  let attempts = 0;
  let lastErr: unknown;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const remaining = totalTimeoutMs - (now() - start);
    if (remaining <= 0) break;
    if (signal?.aborted) throw toCancelledError(signal.reason);

    attempts++;
    try {
      return await withDeadline(op(attempt), remaining, label);
    } catch (err: unknown) {
      lastErr = err;
      const kind = classifyError(err);
      if (kind === "passthrough") throw err;
      if (kind === "terminal") throw toTerminalError(err);
      if (attempt === maxAttempts - 1) break;

      const left = totalTimeoutMs - (now() - start);
      const delay = Math.min(baseDelayMs * 2 ** attempt, left);
      if (delay <= 0) break;
      log.retry.warn(
        { attempt: attempt + 1, delayMs: delay, label, code: errorCodeOf(err) },
        "retry:scheduled",
      );
      await wait(delay, signal);
    }
  }

  log.retry.warn({ attempts, label, elapsedMs: now() - start }, "retry:exhausted");
  throw new RetryExhaustedError(
    attempts,
    lastErr ?? new RetryableTransportError("timeout", "No time left for a first attempt"),
  );
}

/** Bind default options (from config) to the combinator. */
export function createRetryExecutor(defaults: RetryOptions = {}): RetryExecutor {
  return {
    execute<T>(op: RetryOperation<T>, options: RetryOptions = {}): Promise<T> {
      return withRetry(op, { ...defaults, ...options });
    },
  };
}
