/**
 * pending-queue.test.ts — Mutation collapsing, push lifecycle and the failed ledger
 */

import { describe, it, expect } from "vitest";
import { PendingQueue, collapse } from "../src/sync/pending-queue.js";
import type { PendingJournal, PendingKind, PendingOperation } from "../src/stores/types.js";
import { transportError } from "./helpers/fake-remote-store.js";
import { createClock } from "./helpers/fake-clock.js";

// ─── Helpers ────────────────────────────────────────────────

class MemoryJournal implements PendingJournal {
  saved: PendingOperation[];

  constructor(initial: PendingOperation[] = []) {
    this.saved = initial;
  }

  load(): PendingOperation[] {
    return [...this.saved];
  }

  save(ops: readonly PendingOperation[]): void {
    this.saved = [...ops];
  }
}

function op(entityId: string, kind: PendingKind, submittedAt: number, payload: Record<string, unknown> | null = {}): PendingOperation {
  return {
    opId: `${entityId}-${kind}-${submittedAt}`,
    collection: "foodEntries",
    entityId,
    kind,
    payload: kind === "delete" ? null : payload,
    submittedAt,
    attempts: 0,
    lastError: null,
  };
}

function makeQueue(initial: PendingOperation[] = []) {
  const clock = createClock(0);
  const journal = new MemoryJournal(initial);
  const queue = new PendingQueue(journal, clock.now);
  const write = (entityId: string, kind: PendingKind, payload: Record<string, unknown> | null = null) => {
    clock.advance(1);
    return queue.enqueue({ collection: "foodEntries", entityId, kind, payload });
  };
  return { queue, journal, clock, write };
}

// ─── Collapse Table ─────────────────────────────────────────

describe("collapse", () => {
  const cases: [PendingKind, PendingKind, PendingKind | null][] = [
    ["create", "create", "create"],
    ["create", "update", "create"],
    ["create", "delete", null],
    ["update", "create", "create"],
    ["update", "update", "update"],
    ["update", "delete", "delete"],
    ["delete", "create", "create"],
    ["delete", "update", "create"],
    ["delete", "delete", "delete"],
  ];

  for (const [prev, next, expected] of cases) {
    it(`${prev} then ${next} → ${expected ?? "nothing"}`, () => {
      expect(collapse(op("e1", prev, 1), op("e1", next, 2), false)?.kind ?? null).toBe(expected);
    });
  }

  it("keeps a delete after a create the remote may already have", () => {
    expect(collapse(op("e1", "create", 1), op("e1", "delete", 2), true)?.kind).toBe("delete");
  });

  it("carries the newer payload and timestamp", () => {
    const merged = collapse(op("e1", "create", 1, { v: 1 }), op("e1", "update", 2, { v: 2 }), false);
    expect(merged).toMatchObject({ kind: "create", payload: { v: 2 }, submittedAt: 2 });
  });
});

// ─── Enqueue ────────────────────────────────────────────────

describe("PendingQueue.enqueue", () => {
  it("queues a new mutation and journals it", () => {
    const { queue, journal, write } = makeQueue();
    const queued = write("e1", "create", { name: "Apple" });

    expect(queued).toMatchObject({ entityId: "e1", kind: "create", payload: { name: "Apple" }, attempts: 0, submittedAt: 1 });
    expect(queue.snapshot()).toEqual([queued]);
    expect(journal.saved).toEqual([queued]);
  });

  it("holds at most one queued operation per entity", () => {
    const { queue, write } = makeQueue();
    write("e1", "create", { v: 1 });
    write("e1", "update", { v: 2 });
    write("e1", "update", { v: 3 });

    const ops = queue.snapshot();
    expect(ops).toHaveLength(1);
    expect(ops[0]).toMatchObject({ kind: "create", payload: { v: 3 } });
  });

  it("nets a create then delete to nothing", () => {
    const { queue, journal, write } = makeQueue();
    write("e1", "create", { name: "Apple" });
    expect(write("e1", "delete")).toBeNull();

    expect(queue.pendingCount()).toBe(0);
    expect(queue.hasPending("foodEntries", "e1")).toBe(false);
    expect(journal.saved).toEqual([]);
  });

  it("queues a mutation separately while the entity is being pushed", () => {
    const { queue, write } = makeQueue();
    write("e1", "create", { name: "Apple" });
    const inFlight = queue.beginSync("foodEntries", "e1");
    write("e1", "delete");

    expect(inFlight?.kind).toBe("create");
    expect(queue.snapshot().map((o) => o.kind)).toEqual(["delete"]);
    expect(queue.pendingCount()).toBe(2);
  });

  it("orders the snapshot by submission time", () => {
    const { queue, write } = makeQueue();
    write("b", "create", {});
    write("a", "create", {});
    expect(queue.snapshot().map((o) => o.entityId)).toEqual(["b", "a"]);
  });
});

// ─── Push Lifecycle ─────────────────────────────────────────

describe("PendingQueue push lifecycle", () => {
  it("beginSync() moves an op to syncing exactly once", () => {
    const { queue, journal, write } = makeQueue();
    write("e1", "create", {});
    const first = queue.beginSync("foodEntries", "e1");
    expect(first).toBeDefined();
    expect(queue.beginSync("foodEntries", "e1")).toBeUndefined();
    expect(queue.snapshot()).toEqual([]);
    expect(journal.saved).toHaveLength(1);
  });

  it("complete() removes the op", () => {
    const { queue, journal, write } = makeQueue();
    write("e1", "create", {});
    const inFlight = queue.beginSync("foodEntries", "e1");
    if (inFlight) queue.complete(inFlight);
    expect(queue.pendingCount()).toBe(0);
    expect(journal.saved).toEqual([]);
  });

  it("a retryable failure requeues with the attempt recorded", () => {
    const { queue, write } = makeQueue();
    write("e1", "update", { v: 1 });
    const inFlight = queue.beginSync("foodEntries", "e1");
    if (inFlight) queue.fail(inFlight, transportError("ECONNRESET"), true);

    expect(queue.snapshot()).toEqual([
      expect.objectContaining({ entityId: "e1", attempts: 1, lastError: "socket failure: ECONNRESET" }),
    ]);
  });

  it("a requeued failure folds into a newer queued mutation", () => {
    const { queue, write } = makeQueue();
    write("e1", "update", { v: 1 });
    const inFlight = queue.beginSync("foodEntries", "e1");
    write("e1", "update", { v: 2 });
    if (inFlight) queue.fail(inFlight, transportError(), true);

    const ops = queue.snapshot();
    expect(ops).toHaveLength(1);
    expect(ops[0]).toMatchObject({ kind: "update", payload: { v: 2 } });
  });

  it("a terminal failure moves the op to the ledger", () => {
    const { queue, clock, write } = makeQueue();
    write("e1", "create", {});
    const inFlight = queue.beginSync("foodEntries", "e1");
    clock.advance(10);
    if (inFlight) queue.fail(inFlight, new Error("permission denied"), false);

    expect(queue.pendingCount()).toBe(0);
    expect(queue.failedOperations()).toEqual([
      {
        operation: expect.objectContaining({ entityId: "e1", attempts: 1 }),
        error: "permission denied",
        failedAt: 11,
      },
    ]);
  });
});

// ─── Failed Ledger ──────────────────────────────────────────

describe("PendingQueue failed ledger", () => {
  function withFailure() {
    const ctx = makeQueue();
    ctx.write("e1", "create", { v: 1 });
    const inFlight = ctx.queue.beginSync("foodEntries", "e1");
    if (inFlight) ctx.queue.fail(inFlight, new Error("rejected"), false);
    const [failed] = ctx.queue.failedOperations();
    return { ...ctx, opId: failed.operation.opId };
  }

  it("retryFailed() requeues and clears lastError", () => {
    const { queue, opId } = withFailure();
    expect(queue.retryFailed(opId)).toBe(true);
    expect(queue.failedOperations()).toEqual([]);
    expect(queue.snapshot()).toEqual([expect.objectContaining({ opId, attempts: 1, lastError: null })]);
    expect(queue.retryFailed(opId)).toBe(false);
  });

  it("discardFailed() and clearFailed() drop entries", () => {
    const { queue, opId } = withFailure();
    expect(queue.discardFailed("unknown")).toBe(false);
    expect(queue.discardFailed(opId)).toBe(true);
    expect(queue.failedOperations()).toEqual([]);

    const second = withFailure();
    second.queue.clearFailed();
    expect(second.queue.failedOperations()).toEqual([]);
  });
});

// ─── Journal ────────────────────────────────────────────────

describe("PendingQueue journal", () => {
  it("load() folds journaled ops per entity", () => {
    const { queue } = makeQueue([
      op("e2", "delete", 3),
      op("e1", "create", 1, { v: 1 }),
      op("e1", "update", 2, { v: 2 }),
    ]);
    expect(queue.load()).toBe(2);
    expect(queue.snapshot().map((o) => [o.entityId, o.kind, o.payload])).toEqual([
      ["e1", "create", { v: 2 }],
      ["e2", "delete", null],
    ]);
  });

  it("load() keeps a delete journaled after its create", () => {
    const { queue } = makeQueue([op("e1", "create", 1), op("e1", "delete", 2)]);
    queue.load();
    expect(queue.snapshot().map((o) => o.kind)).toEqual(["delete"]);
  });

  it("journals in-flight ops so a restart retries them", () => {
    const { queue, journal, write } = makeQueue();
    write("e1", "create", {});
    queue.beginSync("foodEntries", "e1");

    const restarted = new PendingQueue(journal);
    expect(restarted.load()).toBe(1);
  });

  it("dropCollection() removes only that collection's queued ops", () => {
    const { queue } = makeQueue();
    queue.enqueue({ collection: "foodEntries", entityId: "a", kind: "create", payload: {} });
    queue.enqueue({ collection: "settings", entityId: "b", kind: "update", payload: {} });
    expect(queue.dropCollection("foodEntries")).toBe(1);
    expect(queue.snapshot().map((o) => o.collection)).toEqual(["settings"]);
  });
});
