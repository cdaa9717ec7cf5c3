/**
 * retry.test.ts — Backoff, total deadline and error classification in withRetry
 */

import { describe, it, expect, vi } from "vitest";
import { createRetryExecutor, sleep, withRetry } from "../src/sync/retry.js";
import {
  AuthStateChangedError,
  CancelledError,
  RetryableTransportError,
  RetryExhaustedError,
  TerminalError,
} from "../src/errors.js";
import { createClock } from "./helpers/fake-clock.js";
import { storeError, transportError } from "./helpers/fake-remote-store.js";

/** Fails `failures` times with a socket error, then resolves "ok". */
function flaky(failures: number) {
  let calls = 0;
  return vi.fn(async (_attempt: number) => {
    calls++;
    if (calls <= failures) throw transportError("ECONNRESET");
    return "ok";
  });
}

// ─── Backoff ────────────────────────────────────────────────

describe("withRetry backoff", () => {
  it("succeeds on the third attempt after 1s + 2s of backoff", async () => {
    const clock = createClock();
    const start = clock.now();
    const op = flaky(2);

    const result = await withRetry(op, { maxAttempts: 3, now: clock.now, sleep: clock.sleep });

    expect(result).toBe("ok");
    expect(op).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([1_000, 2_000]);
    const elapsed = clock.now() - start;
    expect(elapsed).toBeGreaterThanOrEqual(3_000);
    expect(elapsed).toBeLessThan(15_000);
  });

  it("passes the 0-based attempt number", async () => {
    const clock = createClock();
    const op = flaky(2);
    await withRetry(op, { now: clock.now, sleep: clock.sleep });
    expect(op.mock.calls.map(([attempt]) => attempt)).toEqual([0, 1, 2]);
  });

  it("returns the first success without sleeping", async () => {
    const clock = createClock();
    const op = flaky(0);
    expect(await withRetry(op, { now: clock.now, sleep: clock.sleep })).toBe("ok");
    expect(clock.sleeps).toEqual([]);
  });
});

// ─── Failure Modes ──────────────────────────────────────────

describe("withRetry failures", () => {
  it("raises a terminal error after exactly one attempt", async () => {
    const clock = createClock();
    const original = storeError("permission-denied");
    const op = vi.fn(async () => {
      throw original;
    });

    const err = await withRetry(op, { now: clock.now, sleep: clock.sleep }).catch((e: unknown) => e);

    expect(op).toHaveBeenCalledTimes(1);
    expect(err).toBeInstanceOf(TerminalError);
    expect(err).toMatchObject({ reason: "permission-denied", cause: original });
    expect(clock.sleeps).toEqual([]);
  });

  it("treats unknown errors as terminal", async () => {
    const op = vi.fn(async () => {
      throw new Error("something odd");
    });
    await expect(withRetry(op)).rejects.toMatchObject({ reason: "unknown", message: "something odd" });
    expect(op).toHaveBeenCalledTimes(1);
  });

  it("gives up after maxAttempts with the last error as cause", async () => {
    const clock = createClock();
    const op = flaky(10);

    const err = await withRetry(op, { maxAttempts: 3, now: clock.now, sleep: clock.sleep }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RetryExhaustedError);
    expect(err).toMatchObject({ attempts: 3, reason: "exhausted" });
    expect(err instanceof RetryExhaustedError && err.cause).toMatchObject({ code: "ECONNRESET" });
    expect(op).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([1_000, 2_000]);
  });

  it("clamps backoff to the remaining budget and stops when it runs out", async () => {
    const clock = createClock();
    const op = flaky(10);

    const err = await withRetry(op, {
      maxAttempts: 5,
      totalTimeoutMs: 2_500,
      now: clock.now,
      sleep: clock.sleep,
    }).catch((e: unknown) => e);

    expect(err).toMatchObject({ name: "RetryExhaustedError", attempts: 2 });
    expect(clock.sleeps).toEqual([1_000, 1_500]);
    expect(op).toHaveBeenCalledTimes(2);
  });

  it("passes auth changes through untouched", async () => {
    const changed = new AuthStateChangedError(1, 2);
    const op = vi.fn(async () => {
      throw changed;
    });
    await expect(withRetry(op)).rejects.toBe(changed);
    expect(op).toHaveBeenCalledTimes(1);
  });

  it("fails a hung attempt when the total budget elapses", async () => {
    const op = vi.fn(() => new Promise<string>(() => {}));

    const err = await withRetry(op, { maxAttempts: 1, totalTimeoutMs: 30 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RetryExhaustedError);
    const cause = err instanceof RetryExhaustedError ? err.cause : undefined;
    expect(cause).toBeInstanceOf(RetryableTransportError);
    expect(cause).toMatchObject({ reason: "timeout" });
  });
});

// ─── Cancellation ───────────────────────────────────────────

describe("withRetry cancellation", () => {
  it("does not start when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const op = flaky(0);

    await expect(withRetry(op, { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
    expect(op).not.toHaveBeenCalled();
  });

  it("stops during backoff when the signal aborts", async () => {
    const controller = new AbortController();
    const op = vi.fn(async () => {
      controller.abort();
      throw transportError("ETIMEDOUT");
    });

    await expect(withRetry(op, { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
    expect(op).toHaveBeenCalledTimes(1);
  });
});

describe("sleep", () => {
  it("resolves after the delay", async () => {
    await expect(sleep(5)).resolves.toBeUndefined();
  });

  it("rejects with CancelledError on abort", async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });
});

// ─── Executor ───────────────────────────────────────────────

describe("createRetryExecutor", () => {
  it("applies bound defaults, overridable per call", async () => {
    const clock = createClock();
    const retry = createRetryExecutor({ maxAttempts: 2, baseDelayMs: 50, now: clock.now, sleep: clock.sleep });

    await expect(retry.execute(flaky(1))).resolves.toBe("ok");
    expect(clock.sleeps).toEqual([50]);

    await expect(retry.execute(flaky(1), { maxAttempts: 1 })).rejects.toMatchObject({ attempts: 1 });
  });
});
