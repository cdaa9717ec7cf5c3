/**
 * cache-epochs.ts — Write-after-read guard for cache commits.
 *
 * A fetch captures the epoch of its key before going to the network.
 * Local writes bump the epoch of the affected pattern. When the fetch
 * completes it commits only if the captured epoch is still current.
 */

import { isUnderBase } from "./cache-keys.js";

export class CacheEpochs {
  private counter = 0;
  private floor = 0;
  private readonly exact = new Map<string, number>();
  private readonly prefix = new Map<string, number>();

  capture(key: string): number {
    let epoch = Math.max(this.floor, this.exact.get(key) ?? 0);
    for (const [pfx, value] of this.prefix) {
      if (isUnderBase(key, pfx) && value > epoch) epoch = value;
    }
    return epoch;
  }

  isCurrent(key: string, captured: number): boolean {
    return this.capture(key) === captured;
  }

  bump(pattern: string): void {
    this.counter += 1;
    if (pattern.endsWith("*")) {
      this.prefix.set(pattern.slice(0, -1), this.counter);
      return;
    }
    this.exact.set(pattern, this.counter);
  }

  bumpAll(): void {
    this.counter += 1;
    this.floor = this.counter;
    this.exact.clear();
    this.prefix.clear();
  }
}
