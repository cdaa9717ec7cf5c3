/**
 * events.ts — Subscriber channel for cache and sync notifications.
 *
 * Listeners run synchronously in subscription order; the host marshals
 * updates onto its own rendering context. A throwing listener is logged
 * and the remaining listeners still receive the event.
 */

import { log } from "../logger.js";
import type { PendingOperation } from "../stores/types.js";

// ─── Events ─────────────────────────────────────────────────

export interface SyncReport {
  synced: number;
  /** Failed with a retryable error; still queued */
  retried: number;
  /** Failed terminally; moved to the failed ledger */
  dropped: number;
  /** Not attempted (offline, breaker open, identity changed, already in flight) */
  skipped: number;
  /** Queued + in flight after the drain */
  pending: number;
}

export type DataEvent =
  | { type: "invalidated"; patterns: string[] }
  | { type: "updated"; key: string; collection: string; source: "local" | "remote" }
  | { type: "sync-completed"; report: SyncReport }
  | { type: "operation-failed"; operation: PendingOperation; error: string }
  | { type: "identity-changed"; ownerId: string | null; generation: number }
  | { type: "cleared" };

export type DataEventType = DataEvent["type"];

export type DataEventListener = (event: DataEvent) => void;

// ─── Channel ────────────────────────────────────────────────

export class DataEventChannel {
  private readonly listeners = new Set<DataEventListener>();

  subscribe(listener: DataEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: DataEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (err) {
        log.sync.error({ err, event: event.type }, "events:listener-failed");
      }
    }
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  close(): void {
    this.listeners.clear();
  }
}
