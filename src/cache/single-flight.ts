/**
 * single-flight.ts — One outstanding fetch per key.
 *
 * Concurrent callers for the same key join the first caller's promise and
 * observe the identical value or error. Check-and-register happens in one
 * synchronous block, so no two callers can both register for a key.
 *
 * The registration is removed in a finally block on every exit path.
 * cancel()/cancelAll() abort the work's signal, reject every joiner with
 * CancelledError and free the key at once so a later caller starts fresh.
 */

import { CancelledError } from "../errors.js";
import { log } from "../logger.js";

// ─── Types ──────────────────────────────────────────────────

export type FlightWork<V> = (signal: AbortSignal) => Promise<V>;

interface FlightToken<V> {
  promise: Promise<V>;
  controller: AbortController;
  joiners: number;
}

export interface SingleFlightOptions {
  /** Called each time a caller joins an existing flight */
  onJoin?: (key: string) => void;
}

// ─── Coordinator ────────────────────────────────────────────

export class SingleFlight<V> {
  private readonly inflight = new Map<string, FlightToken<V>>();
  private readonly onJoin?: (key: string) => void;

  constructor(options: SingleFlightOptions = {}) {
    this.onJoin = options.onJoin;
  }

  get size(): number {
    return this.inflight.size;
  }

  isInFlight(key: string): boolean {
    return this.inflight.has(key);
  }

  runOrJoin(key: string, work: FlightWork<V>): Promise<V> {
    const existing = this.inflight.get(key);
    if (existing) {
      existing.joiners++;
      log.flight.debug({ key, joiners: existing.joiners }, "flight:join");
      this.onJoin?.(key);
      return existing.promise;
    }

    const controller = new AbortController();
    const token: FlightToken<V> = {
      promise: this.execute(key, work, controller),
      controller,
      joiners: 1,
    };
    this.inflight.set(key, token);
    return token.promise;
  }

  /** Abort one flight. Returns false when nothing was running for the key. */
  cancel(key: string, reason = "Fetch cancelled"): boolean {
    const token = this.inflight.get(key);
    if (!token) return false;
    this.inflight.delete(key);
    token.controller.abort(new CancelledError(reason));
    log.flight.debug({ key }, "flight:cancel");
    return true;
  }

  cancelAll(reason = "All fetches cancelled"): number {
    const keys = [...this.inflight.keys()];
    for (const key of keys) this.cancel(key, reason);
    return keys.length;
  }

  // ── Internals ─────────────────────────────────────────────

  private execute(key: string, work: FlightWork<V>, controller: AbortController): Promise<V> {
    const { signal } = controller;

    // Deferred one microtask: the token is registered before work starts.
    const running = Promise.resolve()
      .then(() => {
        signal.throwIfAborted();
        return work(signal);
      })
      .finally(() => {
        // Only remove our own registration; a cancel may already have
        // freed the key for a newer flight.
        if (this.inflight.get(key)?.controller === controller) {
          this.inflight.delete(key);
        }
      });

    return new Promise<V>((resolve, reject) => {
      const onAbort = (): void => {
        reject(signal.reason instanceof CancelledError ? signal.reason : new CancelledError());
      };
      signal.addEventListener("abort", onAbort, { once: true });
      running
        .then(resolve, reject)
        .finally(() => signal.removeEventListener("abort", onAbort));
    });
  }
}
