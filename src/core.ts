/**
 * core.ts — The data-core coordinator
 *
 * One explicitly constructed instance owns every cache, queue and timer.
 * Consumers (UI layer, background sync worker) receive it by injection;
 * tests build a fresh one per test.
 *
 *   const core = createDataCore({ localStores, remote, identity });
 *   core.init();                      // follow identity, start periodic sync
 *   await core.writeLocal({ collection: "foodEntries", id: "e1", data });
 *   const { data } = await core.readThrough({ collection: "foodEntries", id: "e1" });
 *   core.teardown();
 */

import { AuthFence } from "./auth/auth-fence.js";
import { CacheEpochs } from "./cache/cache-epochs.js";
import { CacheMetrics, type CacheMetricsSnapshot } from "./cache/cache-metrics.js";
import { SingleFlight } from "./cache/single-flight.js";
import { TtlCache } from "./cache/ttl-cache.js";
import { resolveConfig, type DataCoreConfig } from "./config.js";
import { log } from "./logger.js";
import type { Entity, EntityQuery, IdentityProvider, LocalStoreFactory, PendingOperation, RemoteStore } from "./stores/types.js";
import { CircuitBreaker } from "./sync/circuit-breaker.js";
import {
  SyncDispatcher,
  type ErrorReporter,
  type ReadResult,
  type SyncStatus,
  type WriteInput,
} from "./sync/dispatcher.js";
import { DataEventChannel, type DataEventListener, type SyncReport } from "./sync/events.js";
import type { FailedOperation } from "./sync/pending-queue.js";
import { createRetryExecutor, type Sleep } from "./sync/retry.js";

// ─── Types ──────────────────────────────────────────────────

export interface DataCoreOptions {
  localStores: LocalStoreFactory;
  remote: RemoteStore;
  identity: IdentityProvider;
  /** Overrides on top of env + defaults */
  config?: Partial<DataCoreConfig>;
  reportError?: ErrorReporter;
  /** Clock for cache TTLs, backoff budget and the breaker */
  now?: () => number;
  /** Backoff sleep (tests pass an instant one) */
  sleep?: Sleep;
}

export interface DataCore {
  readonly config: DataCoreConfig;

  /** Bind the identity provider and start periodic sync. Idempotent. */
  init(): void;
  /** Unbind, stop timers, cancel fetches, clear caches. */
  teardown(): void;

  readThrough(query: EntityQuery): Promise<ReadResult>;
  writeLocal(input: WriteInput): Promise<Entity>;
  deleteLocal(collection: string, id: string): Promise<boolean>;
  invalidateCollection(collection: string): void;

  /** Fire-and-forget background drain. */
  triggerSync(options?: { force?: boolean }): void;
  syncNow(): Promise<SyncReport>;
  refreshAll(collections?: readonly string[]): Promise<number>;
  deleteAllData(collections?: readonly string[]): Promise<number>;
  setConnectivity(online: boolean): void;

  /** Sign-out: cancel in-flight work and clear caches. */
  clearAll(): void;
  subscribe(listener: DataEventListener): () => void;

  getSyncStatus(): SyncStatus;
  pendingOperations(): PendingOperation[];
  getFailedOperations(): FailedOperation[];
  retryFailedOperation(opId: string): boolean;
  discardFailedOperation(opId: string): boolean;
  clearFailedOperations(): void;
  metrics(): CacheMetricsSnapshot;

  /** Current auth generation (diagnostics/tests). */
  generation(): number;
}

// ─── Factory ────────────────────────────────────────────────

export function createDataCore(options: DataCoreOptions): DataCore {
  const config = resolveConfig(process.env, options.config);
  const now = options.now ?? Date.now;

  const metrics = new CacheMetrics();
  const fence = new AuthFence();
  const events = new DataEventChannel();
  const cache = new TtlCache<Entity[]>({
    ttlMs: config.cacheTtlMs,
    capacity: config.cacheCapacity,
    now,
    onEvict: () => metrics.record("evictions"),
  });
  const flights = new SingleFlight<Entity[]>({ onJoin: () => metrics.record("flightJoins") });
  const retry = createRetryExecutor({
    maxAttempts: config.retryMaxAttempts,
    totalTimeoutMs: config.retryTotalTimeoutMs,
    baseDelayMs: config.retryBaseDelayMs,
    now,
    ...(options.sleep ? { sleep: options.sleep } : {}),
  });
  const breaker = new CircuitBreaker({
    failureRatio: config.breakerFailureRatio,
    minSamples: config.breakerMinSamples,
    cooldownMs: config.breakerCooldownMs,
    now,
  });

  const dispatcher = new SyncDispatcher({
    localStores: options.localStores,
    remote: options.remote,
    fence,
    cache,
    flights,
    epochs: new CacheEpochs(),
    retry,
    metrics,
    events,
    breaker,
    settings: config,
    reportError: options.reportError,
    now,
  });

  let unbindFence: (() => void) | null = null;
  let unbindProvider: (() => void) | null = null;

  return {
    config,

    init(): void {
      if (unbindFence) return;
      unbindFence = fence.subscribe((change) => dispatcher.handleIdentityChange(change));
      unbindProvider = fence.bind(options.identity);
      dispatcher.startPeriodicSync();
      log.sync.info({ signedIn: fence.currentIdentity() !== null }, "core:init");
    },

    teardown(): void {
      unbindProvider?.();
      unbindFence?.();
      unbindProvider = null;
      unbindFence = null;
      dispatcher.stop();
      events.close();
      log.sync.info("core:teardown");
    },

    readThrough: (query) => dispatcher.readThrough(query),
    writeLocal: (input) => dispatcher.writeLocal(input),
    deleteLocal: (collection, id) => dispatcher.deleteLocal(collection, id),
    invalidateCollection: (collection) => dispatcher.invalidateCollection(collection),

    triggerSync: (opts) => dispatcher.triggerSync(opts),
    syncNow: () => dispatcher.syncNow(),
    refreshAll: (collections) => dispatcher.refreshAll(collections),
    deleteAllData: (collections) => dispatcher.deleteAllData(collections),
    setConnectivity: (online) => dispatcher.setConnectivity(online),

    clearAll: () => dispatcher.clearAll(),
    subscribe: (listener) => events.subscribe(listener),

    getSyncStatus: () => dispatcher.getSyncStatus(),
    pendingOperations: () => dispatcher.pendingOperations(),
    getFailedOperations: () => dispatcher.getFailedOperations(),
    retryFailedOperation: (opId) => dispatcher.retryFailedOperation(opId),
    discardFailedOperation: (opId) => dispatcher.discardFailedOperation(opId),
    clearFailedOperations: () => dispatcher.clearFailedOperations(),
    metrics: () => metrics.snapshot(),

    generation: () => fence.captureGeneration(),
  };
}
