/**
 * circuit-breaker.ts — Stops draining while the remote keeps failing.
 *
 * Evaluated once per drain: with at least `minSamples` pushes and a failure
 * ratio at or above `failureRatio` the breaker opens for `cooldownMs`.
 * A drain with two or more successes closes it early.
 */

import { log } from "../logger.js";

export interface CircuitBreakerOptions {
  failureRatio: number;
  minSamples: number;
  cooldownMs: number;
  now?: () => number;
}

const SUCCESSES_TO_CLOSE = 2;

export class CircuitBreaker {
  private openedAt: number | null = null;
  private readonly options: Required<CircuitBreakerOptions>;

  constructor(options: CircuitBreakerOptions) {
    this.options = { ...options, now: options.now ?? Date.now };
  }

  isOpen(): boolean {
    if (this.openedAt === null) return false;
    if (this.options.now() - this.openedAt >= this.options.cooldownMs) {
      this.openedAt = null;
      log.sync.info("breaker:cooldown-elapsed");
      return false;
    }
    return true;
  }

  /** Record the outcome of one drain. */
  record(successes: number, failures: number): void {
    const total = successes + failures;
    if (successes >= SUCCESSES_TO_CLOSE && this.openedAt !== null) {
      this.openedAt = null;
      log.sync.info({ successes }, "breaker:closed");
    }
    if (total >= this.options.minSamples && failures / total >= this.options.failureRatio) {
      this.openedAt = this.options.now();
      log.sync.warn({ failures, total, cooldownMs: this.options.cooldownMs }, "breaker:open");
    }
  }

  reset(): void {
    this.openedAt = null;
  }
}
