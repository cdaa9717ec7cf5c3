/**
 * pending-queue.ts — Collapsing queue of local mutations awaiting push.
 *
 * At most one queued operation per entity. A new mutation for a queued
 * entity collapses into it, most recent wins:
 *
 *   queued \ new   create    update    delete
 *   create         create    create    (nothing) — unless it may exist remotely
 *   update         update    update    delete
 *   delete         create    create    delete
 *
 * An entity being pushed (Syncing) sits in a separate slot, so a mutation
 * arriving mid-push is queued on its own and drains after the push.
 *
 *   Queued → Syncing → Synced (removed)
 *                    → Failed → Queued   (retryable)
 *                    → Failed → ledger   (terminal)
 *
 * Every change is written through to the owner's PendingJournal.
 */

import { randomUUID } from "node:crypto";
import { errorMessage } from "../errors.js";
import { log } from "../logger.js";
import type { DocumentData, PendingJournal, PendingKind, PendingOperation } from "../stores/types.js";

// ─── Types ──────────────────────────────────────────────────

export interface EnqueueInput {
  collection: string;
  entityId: string;
  kind: PendingKind;
  payload: DocumentData | null;
}

export interface FailedOperation {
  operation: PendingOperation;
  error: string;
  failedAt: number;
}

export function entityKeyOf(collection: string, entityId: string): string {
  return `${collection}/${entityId}`;
}

function keyOf(op: PendingOperation): string {
  return entityKeyOf(op.collection, op.entityId);
}

/**
 * Fold `next` into `prev`. Returns null when the pair cancels out.
 * `remoteMayHaveIt`: prev might already be applied remotely (in flight,
 * or a push that failed partway), so a create+delete still needs the delete.
 */
export function collapse(
  prev: PendingOperation,
  next: PendingOperation,
  remoteMayHaveIt: boolean,
): PendingOperation | null {
  if (next.kind === "delete") {
    if (prev.kind === "create" && !remoteMayHaveIt) return null;
    return next;
  }
  if (prev.kind === "create" || prev.kind === "delete") {
    return { ...next, kind: "create" };
  }
  return next;
}

// ─── Queue ──────────────────────────────────────────────────

export class PendingQueue {
  private readonly queued = new Map<string, PendingOperation>();
  private readonly syncing = new Map<string, PendingOperation>();
  private readonly failed = new Map<string, FailedOperation>();
  private readonly journal: PendingJournal;
  private readonly now: () => number;

  constructor(journal: PendingJournal, now: () => number = Date.now) {
    this.journal = journal;
    this.now = now;
  }

  /** Replace in-memory state with the journal's contents. */
  load(): number {
    this.queued.clear();
    this.syncing.clear();
    const ops = [...this.journal.load()].sort((a, b) => a.submittedAt - b.submittedAt);
    for (const op of ops) {
      const key = keyOf(op);
      const prev = this.queued.get(key);
      // A journaled op may have been mid-push when the process stopped
      const merged = prev ? collapse(prev, op, true) : op;
      if (merged) this.queued.set(key, merged);
    }
    log.sync.debug({ loaded: ops.length, queued: this.queued.size }, "queue:load");
    return this.queued.size;
  }

  enqueue(input: EnqueueInput): PendingOperation | null {
    const key = entityKeyOf(input.collection, input.entityId);
    const op: PendingOperation = {
      opId: randomUUID(),
      ...input,
      submittedAt: this.now(),
      attempts: 0,
      lastError: null,
    };

    const prev = this.queued.get(key);
    const merged = prev ? collapse(prev, op, this.syncing.has(key)) : op;
    if (merged) {
      this.queued.set(key, merged);
    } else {
      this.queued.delete(key);
    }
    this.persist();
    log.sync.debug({ key, kind: input.kind, collapsedTo: merged?.kind ?? "none" }, "queue:enqueue");
    return merged;
  }

  /** Queued operations, oldest first. */
  snapshot(): PendingOperation[] {
    return [...this.queued.values()].sort((a, b) => a.submittedAt - b.submittedAt);
  }

  /** Move an entity's queued op to the Syncing slot. */
  beginSync(collection: string, entityId: string): PendingOperation | undefined {
    const key = entityKeyOf(collection, entityId);
    if (this.syncing.has(key)) return undefined;
    const op = this.queued.get(key);
    if (!op) return undefined;
    this.queued.delete(key);
    this.syncing.set(key, op);
    this.persist();
    return op;
  }

  /** Push succeeded: the operation is done. */
  complete(op: PendingOperation): void {
    const key = keyOf(op);
    if (this.syncing.get(key)?.opId !== op.opId) return;
    this.syncing.delete(key);
    this.persist();
  }

  /**
   * Push failed. Retryable failures go back to the queue (folding with any
   * mutation that arrived meanwhile); terminal ones move to the ledger.
   */
  fail(op: PendingOperation, err: unknown, retryable: boolean): void {
    const key = keyOf(op);
    if (this.syncing.get(key)?.opId === op.opId) this.syncing.delete(key);
    const attempted: PendingOperation = { ...op, attempts: op.attempts + 1, lastError: errorMessage(err) };

    if (retryable) {
      this.requeue(attempted);
    } else {
      this.failed.set(op.opId, { operation: attempted, error: errorMessage(err), failedAt: this.now() });
      log.sync.warn({ key, kind: op.kind, attempts: attempted.attempts }, "queue:dropped");
    }
    this.persist();
  }

  hasPending(collection: string, entityId: string): boolean {
    const key = entityKeyOf(collection, entityId);
    return this.queued.has(key) || this.syncing.has(key);
  }

  /** Queued + in-flight operations. */
  pendingCount(): number {
    return this.queued.size + this.syncing.size;
  }

  // ── Failed-operation ledger ───────────────────────────────

  failedOperations(): FailedOperation[] {
    return [...this.failed.values()].sort((a, b) => a.failedAt - b.failedAt);
  }

  retryFailed(opId: string): boolean {
    const entry = this.failed.get(opId);
    if (!entry) return false;
    this.failed.delete(opId);
    this.requeue({ ...entry.operation, lastError: null });
    this.persist();
    return true;
  }

  discardFailed(opId: string): boolean {
    return this.failed.delete(opId);
  }

  clearFailed(): void {
    this.failed.clear();
  }

  /** Drop queued operations of a collection. In-flight pushes finish. */
  dropCollection(collection: string): number {
    let dropped = 0;
    for (const [key, op] of [...this.queued]) {
      if (op.collection === collection) {
        this.queued.delete(key);
        dropped++;
      }
    }
    if (dropped > 0) this.persist();
    return dropped;
  }

  // ── Internals ─────────────────────────────────────────────

  private requeue(op: PendingOperation): void {
    const key = keyOf(op);
    const newer = this.queued.get(key);
    const merged = newer ? collapse(op, newer, true) : op;
    if (merged) this.queued.set(key, merged);
  }

  private persist(): void {
    this.journal.save([...this.syncing.values(), ...this.queued.values()]);
  }
}
