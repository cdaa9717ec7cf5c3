/**
 * dispatcher.ts — Offline-first read/write path and background sync.
 *
 * Reads:  local store → TTL cache → single-flight(retry(remote)) → import locally
 * Writes: local store + pending queue, pushed later by a background drain
 *
 * Every multi-step operation runs under a FenceTicket and re-checks the
 * auth generation at each checkpoint, so results fetched for one user are
 * never committed once another user is signed in. Local data and the
 * pending queue live in an owner scope opened per identity.
 */

import { randomUUID } from "node:crypto";
import type { AuthFence, FenceTicket, IdentityChange } from "../auth/auth-fence.js";
import type { CacheEpochs } from "../cache/cache-epochs.js";
import { COLLECTION_NAMES, allowsStale, cacheKey, collectionPattern, ttlFor } from "../cache/cache-keys.js";
import type { CacheMetrics } from "../cache/cache-metrics.js";
import type { SingleFlight } from "../cache/single-flight.js";
import type { TtlCache } from "../cache/ttl-cache.js";
import type { DataCoreConfig } from "../config.js";
import {
  AuthStateChangedError,
  CacheMissError,
  RetryExhaustedError,
  classifyError,
  errorMessage,
  toCancelledError,
  toTerminalError,
} from "../errors.js";
import { log } from "../logger.js";
import { applyQuery, toRemoteFilters } from "../stores/query.js";
import type {
  BatchOperation,
  DocumentData,
  Entity,
  EntityQuery,
  LocalStoreFactory,
  OwnerScopedStore,
  PendingOperation,
  RemoteDocument,
  RemoteStore,
} from "../stores/types.js";
import type { CircuitBreaker } from "./circuit-breaker.js";
import type { DataEventChannel, SyncReport } from "./events.js";
import { PendingQueue, type FailedOperation } from "./pending-queue.js";
import type { RetryExecutor } from "./retry.js";

// ─── Types ──────────────────────────────────────────────────

export type ReadSource = "local" | "cache" | "remote" | "stale";

export interface ReadResult {
  data: Entity[];
  source: ReadSource;
}

export interface WriteInput {
  collection: string;
  /** Generated when omitted */
  id?: string;
  data: DocumentData;
}

export interface SyncStatus {
  pendingOperations: number;
  failedOperations: number;
  isConnected: boolean;
  isSyncing: boolean;
  /** Epoch ms of the last drain attempt */
  lastSyncAttempt: number | null;
  breakerOpen: boolean;
}

export interface ErrorReportContext {
  ownerId: string;
  operation: PendingOperation;
}

/** Receives pending operations dropped after a terminal push failure. */
export type ErrorReporter = (error: unknown, context: ErrorReportContext) => void;

export type SyncSettings = Pick<
  DataCoreConfig,
  "cacheTtlMs" | "minSyncIntervalMs" | "syncBatchSize" | "periodicSyncMs" | "reconnectDebounceMs"
>;

export interface SyncDispatcherDeps {
  localStores: LocalStoreFactory;
  remote: RemoteStore;
  fence: AuthFence;
  cache: TtlCache<Entity[]>;
  flights: SingleFlight<Entity[]>;
  epochs: CacheEpochs;
  retry: RetryExecutor;
  metrics: CacheMetrics;
  events: DataEventChannel;
  breaker: CircuitBreaker;
  settings: SyncSettings;
  reportError?: ErrorReporter;
  now?: () => number;
}

interface OwnerScope {
  ownerId: string;
  store: OwnerScopedStore;
  queue: PendingQueue;
}

type PushOutcome = "synced" | "retried" | "dropped" | "skipped";

/** Documents removed per batchCommit when deleting a user's data. */
export const DELETE_BATCH_SIZE = 400;

/** Remote collections are nested under the owning user. */
export function remoteCollectionPath(ownerId: string, collection: string): string {
  return `users/${ownerId}/${collection}`;
}

export function describeSyncStatus(status: SyncStatus): string {
  const n = status.pendingOperations;
  if (!status.isConnected) return `Offline - ${n} change${n === 1 ? "" : "s"} pending`;
  if (status.isSyncing) return "Syncing...";
  if (n > 0) return `${n} change${n === 1 ? "" : "s"} pending`;
  return "Synced";
}

function defaultReporter(error: unknown, context: ErrorReportContext): void {
  const { operation } = context;
  log.sync.error(
    { err: error, opId: operation.opId, collection: operation.collection, kind: operation.kind },
    "sync:operation-dropped",
  );
}

// ─── Dispatcher ─────────────────────────────────────────────

export class SyncDispatcher {
  private readonly deps: SyncDispatcherDeps;
  private readonly now: () => number;
  private readonly reportError: ErrorReporter;

  private scope: OwnerScope | null = null;
  private online = true;
  private stopped = false;
  private draining: Promise<SyncReport> | null = null;
  private rerunRequested = false;
  private lastSyncAttempt: number | null = null;
  private scheduled: ReturnType<typeof setTimeout> | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private periodicTimer: ReturnType<typeof setInterval> | null = null;

  constructor(deps: SyncDispatcherDeps) {
    this.deps = deps;
    this.now = deps.now ?? Date.now;
    this.reportError = deps.reportError ?? defaultReporter;
  }

  // ── Reads ─────────────────────────────────────────────────

  async readThrough(query: EntityQuery): Promise<ReadResult> {
    const { fence, cache, flights, metrics } = this.deps;
    const ticket = fence.begin();
    const scope = this.scopeFor(ticket.ownerId);

    const stored = await scope.store.get(query.collection, { id: query.id, range: query.range });
    fence.checkUnchanged(ticket.generation);
    const local = applyQuery(stored, (e) => e.data, query.filters, query.orderBy, query.limit);
    if (local.length > 0) {
      metrics.record("localHits");
      this.triggerSync();
      return { data: local, source: "local" };
    }

    const key = cacheKey(ticket.ownerId, query);
    try {
      const data = cache.require(key);
      metrics.record("hits");
      log.cache.debug({ key }, "cache:hit");
      return { data, source: "cache" };
    } catch (err: unknown) {
      if (!(err instanceof CacheMissError)) throw err;
      metrics.record("misses");
      log.cache.debug({ key }, "cache:miss");
    }

    try {
      const data = await flights.runOrJoin(key, (signal) => this.fetchRemote(ticket, scope, query, key, signal));
      return { data, source: "remote" };
    } catch (err: unknown) {
      const stale = (query.allowStale ?? allowsStale(query.collection)) && classifyError(err) === "terminal"
        ? cache.peek(key)
        : undefined;
      if (!stale) throw err;
      metrics.record("staleFallbacks");
      log.cache.warn({ key, ageMs: this.now() - stale.fetchedAt, err }, "cache:stale-fallback");
      return { data: stale.value, source: "stale" };
    }
  }

  private async fetchRemote(
    ticket: FenceTicket,
    scope: OwnerScope,
    query: EntityQuery,
    key: string,
    signal: AbortSignal,
  ): Promise<Entity[]> {
    const { fence, retry, epochs, cache, metrics, events } = this.deps;
    const epoch = epochs.capture(key);
    metrics.record("remoteFetches");

    const docs = await retry.execute(
      () => {
        fence.checkUnchanged(ticket.generation);
        return this.fetchDocuments(ticket.ownerId, query);
      },
      { signal, label: `read:${query.collection}` },
    );

    fence.checkUnchanged(ticket.generation);
    if (signal.aborted) throw toCancelledError(signal.reason);

    const entities = this.toEntities(query.collection, docs);
    if (!epochs.isCurrent(key, epoch)) {
      log.cache.debug({ key }, "cache:commit-skipped");
      return entities;
    }
    cache.put(key, entities, ttlFor(query.collection, this.deps.settings.cacheTtlMs));
    await this.importEntities(scope, entities);
    events.emit({ type: "updated", key, collection: query.collection, source: "remote" });
    return entities;
  }

  private async fetchDocuments(ownerId: string, query: EntityQuery): Promise<RemoteDocument[]> {
    const path = remoteCollectionPath(ownerId, query.collection);
    if (query.id !== undefined) {
      const doc = await this.deps.remote.get(path, query.id);
      return doc ? [doc] : [];
    }
    return this.deps.remote.query(path, toRemoteFilters(query), query.orderBy, query.limit);
  }

  private toEntities(collection: string, docs: readonly RemoteDocument[]): Entity[] {
    const fetchedAt = this.now();
    return docs.map((doc) => ({ id: doc.id, collection, data: doc.data, updatedAt: fetchedAt }));
  }

  /** Save remote entities locally, except those with unsynced local changes. */
  private async importEntities(scope: OwnerScope, entities: readonly Entity[]): Promise<number> {
    let imported = 0;
    for (const entity of entities) {
      if (scope.queue.hasPending(entity.collection, entity.id)) continue;
      await scope.store.save(entity);
      imported++;
    }
    return imported;
  }

  // ── Writes ────────────────────────────────────────────────

  async writeLocal(input: WriteInput): Promise<Entity> {
    const ticket = this.deps.fence.begin();
    const scope = this.scopeFor(ticket.ownerId);
    const id = input.id ?? randomUUID();

    const existing = await scope.store.get(input.collection, { id });
    const entity: Entity = { id, collection: input.collection, data: input.data, updatedAt: this.now() };
    await scope.store.save(entity);
    scope.queue.enqueue({
      collection: input.collection,
      entityId: id,
      kind: existing.length > 0 ? "update" : "create",
      payload: input.data,
    });

    this.invalidateFor(ticket.ownerId, input.collection);
    this.deps.events.emit({ type: "updated", key: `${input.collection}/${id}`, collection: input.collection, source: "local" });
    this.triggerSync();
    return entity;
  }

  /** Returns false when the entity was not stored locally. */
  async deleteLocal(collection: string, id: string): Promise<boolean> {
    const ticket = this.deps.fence.begin();
    const scope = this.scopeFor(ticket.ownerId);

    const removed = await scope.store.delete(collection, id);
    scope.queue.enqueue({ collection, entityId: id, kind: "delete", payload: null });

    this.invalidateFor(ticket.ownerId, collection);
    this.triggerSync();
    return removed;
  }

  /** Drop cached reads of one collection for the signed-in user. */
  invalidateCollection(collection: string): void {
    this.invalidateFor(this.deps.fence.requireIdentity(), collection);
  }

  private invalidateFor(ownerId: string, collection: string): void {
    const pattern = collectionPattern(ownerId, collection);
    this.deps.cache.invalidatePattern(pattern);
    this.deps.epochs.bump(pattern);
    this.deps.events.emit({ type: "invalidated", patterns: [pattern] });
  }

  // ── Sync triggers ─────────────────────────────────────────

  /**
   * Schedule a background drain. Skipped while offline or inside the
   * minimum interval after the last drain unless forced; coalesced into
   * one follow-up drain while a drain is running.
   */
  triggerSync(options: { force?: boolean } = {}): void {
    if (this.stopped) return;
    if (!this.online) {
      log.sync.debug("sync:offline-skip");
      return;
    }
    if (this.draining) {
      this.rerunRequested = true;
      return;
    }
    const sinceLast = this.lastSyncAttempt === null ? Infinity : this.now() - this.lastSyncAttempt;
    if (!options.force && sinceLast < this.deps.settings.minSyncIntervalMs) {
      log.sync.debug({ sinceLastMs: sinceLast }, "sync:throttled");
      return;
    }
    if (this.scheduled) return;
    this.scheduled = setTimeout(() => {
      this.scheduled = null;
      this.drain().catch((err: unknown) => {
        if (err instanceof AuthStateChangedError) {
          log.sync.info({ generation: err.actual }, "drain:identity-changed");
          return;
        }
        log.sync.error({ err }, "drain:failed");
      });
    }, 0);
    this.scheduled.unref();
  }

  /** Drain now, bypassing the throttle. Joins a drain already running. */
  syncNow(): Promise<SyncReport> {
    if (this.scheduled) {
      clearTimeout(this.scheduled);
      this.scheduled = null;
    }
    return this.drain();
  }

  private drain(): Promise<SyncReport> {
    if (this.draining) return this.draining;
    const run = this.runDrain().finally(() => {
      this.draining = null;
      if (this.rerunRequested) {
        this.rerunRequested = false;
        this.triggerSync({ force: true });
      }
    });
    this.draining = run;
    return run;
  }

  private async runDrain(): Promise<SyncReport> {
    const { fence, breaker, events } = this.deps;
    this.lastSyncAttempt = this.now();
    const report: SyncReport = { synced: 0, retried: 0, dropped: 0, skipped: 0, pending: 0 };

    const identity = fence.currentIdentity();
    if (identity === null) return report;
    const scope = this.scopeFor(identity);
    const ticket: FenceTicket = { ownerId: identity, generation: fence.captureGeneration() };
    const ops = scope.queue.snapshot();
    report.pending = scope.queue.pendingCount();
    if (ops.length === 0) return report;

    if (!this.online || breaker.isOpen()) {
      report.skipped = ops.length;
      log.sync.debug({ online: this.online, pending: ops.length }, "drain:skipped");
      return report;
    }

    log.sync.info({ pending: ops.length }, "drain:start");
    const batchSize = this.deps.settings.syncBatchSize;
    for (let i = 0; i < ops.length; i += batchSize) {
      fence.checkUnchanged(ticket.generation);
      const batch = ops.slice(i, i + batchSize);
      const outcomes = await Promise.all(batch.map((op) => this.pushOne(scope, ticket, op)));
      for (const outcome of outcomes) report[outcome]++;
    }
    fence.checkUnchanged(ticket.generation);

    breaker.record(report.synced, report.retried + report.dropped);
    report.pending = scope.queue.pendingCount();
    log.sync.info({ ...report }, "drain:done");
    events.emit({ type: "sync-completed", report });
    return report;
  }

  private async pushOne(scope: OwnerScope, ticket: FenceTicket, queued: PendingOperation): Promise<PushOutcome> {
    const op = scope.queue.beginSync(queued.collection, queued.entityId);
    if (!op) return "skipped";

    try {
      await this.deps.retry.execute(
        () => {
          this.deps.fence.checkUnchanged(ticket.generation);
          return this.applyRemote(ticket, op);
        },
        { label: `push:${op.collection}` },
      );
      // A re-opened scope reloaded this op from the journal; leave it to that queue
      if (this.scope !== scope) return "skipped";
      scope.queue.complete(op);
      return "synced";
    } catch (err: unknown) {
      if (this.scope !== scope) {
        log.sync.debug({ collection: op.collection, kind: op.kind }, "push:scope-closed");
        return "skipped";
      }
      // Auth, cancellation and exhausted transport failures stay queued
      const retryable = err instanceof RetryExhaustedError || classifyError(err) !== "terminal";
      scope.queue.fail(op, err, retryable);
      if (retryable) return "retried";

      this.reportError(err, { ownerId: ticket.ownerId, operation: op });
      this.deps.events.emit({ type: "operation-failed", operation: op, error: errorMessage(err) });
      return "dropped";
    }
  }

  private async applyRemote(ticket: FenceTicket, op: PendingOperation): Promise<void> {
    const { remote, fence } = this.deps;
    const path = remoteCollectionPath(ticket.ownerId, op.collection);

    if (op.kind === "delete") {
      try {
        await remote.delete(path, op.entityId);
      } catch (err: unknown) {
        if (classifyError(err) !== "terminal" || toTerminalError(err).reason !== "not-found") throw err;
        log.sync.debug({ collection: op.collection }, "push:already-deleted");
      }
      return;
    }

    // Server-side version counter: last write wins
    const current = await remote.get(path, op.entityId);
    fence.checkUnchanged(ticket.generation);
    const version = current?.data._version;
    const data: DocumentData = {
      ...(op.payload ?? {}),
      _version: (typeof version === "number" ? version : 0) + 1,
      _lastModified: new Date(op.submittedAt).toISOString(),
    };
    await remote.set(path, op.entityId, data, op.kind === "update");
  }

  // ── Bulk operations ───────────────────────────────────────

  /** Pull whole collections from the remote store into the local store. */
  async refreshAll(collections: readonly string[] = COLLECTION_NAMES): Promise<number> {
    const { fence, retry } = this.deps;
    const ticket = fence.begin();
    const scope = this.scopeFor(ticket.ownerId);
    let imported = 0;

    for (const collection of collections) {
      const path = remoteCollectionPath(ticket.ownerId, collection);
      const docs = await retry.execute(
        () => {
          fence.checkUnchanged(ticket.generation);
          return this.deps.remote.query(path);
        },
        { label: `refresh:${collection}` },
      );
      fence.checkUnchanged(ticket.generation);
      imported += await this.importEntities(scope, this.toEntities(collection, docs));
      this.invalidateFor(ticket.ownerId, collection);
    }

    log.sync.info({ collections: collections.length, imported }, "refresh:done");
    return imported;
  }

  /** Delete a user's data remotely (in batches) and locally. */
  async deleteAllData(collections: readonly string[] = COLLECTION_NAMES): Promise<number> {
    const { fence, retry } = this.deps;
    const ticket = fence.begin();
    const scope = this.scopeFor(ticket.ownerId);
    let deleted = 0;

    for (const collection of collections) {
      scope.queue.dropCollection(collection);
      const path = remoteCollectionPath(ticket.ownerId, collection);
      const docs = await retry.execute(
        () => {
          fence.checkUnchanged(ticket.generation);
          return this.deps.remote.query(path);
        },
        { label: `purge:${collection}` },
      );

      for (let i = 0; i < docs.length; i += DELETE_BATCH_SIZE) {
        fence.checkUnchanged(ticket.generation);
        const batch: BatchOperation[] = docs
          .slice(i, i + DELETE_BATCH_SIZE)
          .map((doc): BatchOperation => ({ type: "delete", collection: path, id: doc.id }));
        await retry.execute(
          () => {
            fence.checkUnchanged(ticket.generation);
            return this.deps.remote.batchCommit(batch);
          },
          { label: `purge:${collection}` },
        );
        deleted += batch.length;
      }

      for (const entity of await scope.store.list(collection)) {
        await scope.store.delete(collection, entity.id);
      }
      this.invalidateFor(ticket.ownerId, collection);
    }

    log.sync.info({ deleted }, "purge:done");
    return deleted;
  }

  // ── Connectivity & scheduling ─────────────────────────────

  /** Going online drains after the reconnect debounce. */
  setConnectivity(online: boolean): void {
    const wasOnline = this.online;
    this.online = online;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (online && !wasOnline && !this.stopped) {
      log.sync.info({ debounceMs: this.deps.settings.reconnectDebounceMs }, "sync:reconnected");
      this.reconnectTimer = setTimeout(() => {
        this.reconnectTimer = null;
        this.triggerSync({ force: true });
      }, this.deps.settings.reconnectDebounceMs);
      this.reconnectTimer.unref();
    }
  }

  startPeriodicSync(): void {
    if (this.periodicTimer || this.stopped) return;
    this.periodicTimer = setInterval(() => this.triggerSync(), this.deps.settings.periodicSyncMs);
    this.periodicTimer.unref();
  }

  stopPeriodicSync(): void {
    if (!this.periodicTimer) return;
    clearInterval(this.periodicTimer);
    this.periodicTimer = null;
  }

  getSyncStatus(): SyncStatus {
    return {
      pendingOperations: this.scope?.queue.pendingCount() ?? 0,
      failedOperations: this.scope?.queue.failedOperations().length ?? 0,
      isConnected: this.online,
      isSyncing: this.draining !== null,
      lastSyncAttempt: this.lastSyncAttempt,
      breakerOpen: this.deps.breaker.isOpen(),
    };
  }

  /** Queued operations of the signed-in user, oldest first. */
  pendingOperations(): PendingOperation[] {
    return this.scope?.queue.snapshot() ?? [];
  }

  // ── Failed-operation ledger ───────────────────────────────

  getFailedOperations(): FailedOperation[] {
    return this.scope?.queue.failedOperations() ?? [];
  }

  retryFailedOperation(opId: string): boolean {
    const requeued = this.scope?.queue.retryFailed(opId) ?? false;
    if (requeued) this.triggerSync({ force: true });
    return requeued;
  }

  discardFailedOperation(opId: string): boolean {
    return this.scope?.queue.discardFailed(opId) ?? false;
  }

  clearFailedOperations(): void {
    this.scope?.queue.clearFailed();
  }

  // ── Lifecycle ─────────────────────────────────────────────

  /**
   * Sign-out: cancel in-flight fetches, drop cached reads and the owner
   * scope. Pending operations survive in the owner's journal.
   */
  clearAll(): void {
    const { flights, cache, epochs, metrics, events } = this.deps;
    const cancelled = flights.cancelAll("Data cleared");
    cache.clear();
    epochs.bumpAll();
    metrics.reset();
    this.scope = null;
    this.rerunRequested = false;
    log.sync.info({ cancelled }, "core:cleared");
    events.emit({ type: "cleared" });
  }

  handleIdentityChange(change: IdentityChange): void {
    this.clearAll();
    if (change.identity !== null) {
      this.scopeFor(change.identity);
      this.triggerSync({ force: true });
    }
    this.deps.events.emit({ type: "identity-changed", ownerId: change.identity, generation: change.generation });
  }

  stop(): void {
    this.stopped = true;
    this.stopPeriodicSync();
    for (const timer of [this.scheduled, this.reconnectTimer]) {
      if (timer) clearTimeout(timer);
    }
    this.scheduled = null;
    this.reconnectTimer = null;
    this.clearAll();
  }

  private scopeFor(ownerId: string): OwnerScope {
    if (this.scope?.ownerId === ownerId) return this.scope;
    const store = this.deps.localStores.forOwner(ownerId);
    const queue = new PendingQueue(store.journal, this.now);
    queue.load();
    this.scope = { ownerId, store, queue };
    log.sync.debug({ pending: queue.pendingCount() }, "scope:open");
    return this.scope;
  }
}
