/**
 * index.ts — Public surface of the data core
 */

export { createDataCore } from "./core.js";
export type { DataCore, DataCoreOptions } from "./core.js";

export { DEFAULT_CONFIG, resolveConfig } from "./config.js";
export type { DataCoreConfig } from "./config.js";

export { log, rootLogger } from "./logger.js";
export type { Logger } from "./logger.js";

export {
  AuthStateChangedError,
  CancelledError,
  DataCoreError,
  ErrorCode,
  NotAuthenticatedError,
  RetryableTransportError,
  RetryExhaustedError,
  TerminalError,
  classifyError,
} from "./errors.js";
export type { ErrorClass, ErrorCodeValue, RetryableReason, TerminalReason } from "./errors.js";

export { AuthFence } from "./auth/auth-fence.js";
export type { FenceTicket, IdentityChange, IdentityListener } from "./auth/auth-fence.js";

export { TtlCache } from "./cache/ttl-cache.js";
export type { CacheEntry, TtlCacheOptions } from "./cache/ttl-cache.js";
export { SingleFlight } from "./cache/single-flight.js";
export type { FlightWork, SingleFlightOptions } from "./cache/single-flight.js";
export { CacheEpochs } from "./cache/cache-epochs.js";
export { CacheMetrics } from "./cache/cache-metrics.js";
export type { CacheCounter, CacheMetricsSnapshot } from "./cache/cache-metrics.js";
export { COLLECTIONS, COLLECTION_NAMES, TTL, cacheKey, collectionPattern, ttlFor } from "./cache/cache-keys.js";
export type { CollectionName, CollectionPolicy, TtlTier } from "./cache/cache-keys.js";

export { createRetryExecutor, sleep, withRetry } from "./sync/retry.js";
export type { RetryExecutor, RetryOperation, RetryOptions, Sleep } from "./sync/retry.js";
export { CircuitBreaker } from "./sync/circuit-breaker.js";
export type { CircuitBreakerOptions } from "./sync/circuit-breaker.js";
export { DataEventChannel } from "./sync/events.js";
export type { DataEvent, DataEventListener, DataEventType, SyncReport } from "./sync/events.js";
export { PendingQueue, collapse } from "./sync/pending-queue.js";
export type { FailedOperation } from "./sync/pending-queue.js";
export { SyncDispatcher, describeSyncStatus, remoteCollectionPath } from "./sync/dispatcher.js";
export type { ErrorReporter, ErrorReportContext, ReadResult, ReadSource, SyncStatus, WriteInput } from "./sync/dispatcher.js";

export { applyQuery } from "./stores/query.js";
export { createSqliteLocalStore } from "./stores/sqlite-local-store.js";
export type { SqliteLocalStoreFactory } from "./stores/sqlite-local-store.js";
export { buildQuery, createPool, createPostgresRemoteStore, withTransaction } from "./stores/postgres-remote-store.js";
export type * from "./stores/types.js";
