/**
 * types.ts — Collaborator interfaces and shared data model
 *
 * The core depends only on these interfaces. Concrete backends:
 *   LocalStoreFactory → sqlite-local-store.ts (better-sqlite3)
 *   RemoteStore       → postgres-remote-store.ts (pg)
 *   IdentityProvider  → supplied by the host application
 */

// ─── Documents & Entities ───────────────────────────────────

export type DocumentData = Record<string, unknown>;

export interface Entity {
  id: string;
  collection: string;
  data: DocumentData;
  /** Epoch ms of the last local write or import */
  updatedAt: number;
}

export type FieldValue = string | number | boolean | null;

/** Half-open range on a data field: from ≤ value < to. */
export interface RangeSelector {
  field: string;
  from?: string | number;
  to?: string | number;
}

export type FilterOp = "==" | "!=" | "<" | "<=" | ">" | ">=";

export interface QueryFilter {
  field: string;
  op: FilterOp;
  value: FieldValue;
}

export interface QueryOrder {
  field: string;
  direction?: "asc" | "desc";
}

/** A read request as the UI issues it. */
export interface EntityQuery {
  collection: string;
  id?: string;
  range?: RangeSelector;
  filters?: QueryFilter[];
  orderBy?: QueryOrder;
  limit?: number;
  /** Override the collection's stale-fallback policy */
  allowStale?: boolean;
}

// ─── Pending Operations ─────────────────────────────────────

export type PendingKind = "create" | "update" | "delete";

export interface PendingOperation {
  opId: string;
  collection: string;
  entityId: string;
  kind: PendingKind;
  /** Full entity data; null for deletes */
  payload: DocumentData | null;
  submittedAt: number;
  attempts: number;
  lastError: string | null;
}

/** Write-through persistence for one owner's pending operations. */
export interface PendingJournal {
  load(): PendingOperation[];
  save(ops: readonly PendingOperation[]): void;
}

// ─── Local Persistent Store ─────────────────────────────────

export interface LocalSelector {
  id?: string;
  range?: RangeSelector;
}

export interface LocalStore {
  /** Insert or replace by (collection, id). */
  save(entity: Entity): Promise<void>;
  /** Entities matching the selector; everything in the collection when empty. */
  get(collection: string, selector?: LocalSelector): Promise<Entity[]>;
  /** Returns false when nothing was stored under that id. */
  delete(collection: string, id: string): Promise<boolean>;
  list(collection: string): Promise<Entity[]>;
}

export interface OwnerScopedStore extends LocalStore {
  readonly ownerId: string;
  readonly journal: PendingJournal;
}

export interface LocalStoreFactory {
  forOwner(ownerId: string): OwnerScopedStore;
  close(): void;
}

// ─── Remote Document Store ──────────────────────────────────

export interface RemoteDocument {
  id: string;
  data: DocumentData;
}

export type BatchOperation =
  | { type: "set"; collection: string; id: string; data: DocumentData; merge?: boolean }
  | { type: "delete"; collection: string; id: string };

export interface RemoteStore {
  get(collection: string, id: string): Promise<RemoteDocument | null>;
  query(
    collection: string,
    filters?: readonly QueryFilter[],
    order?: QueryOrder,
    limit?: number,
  ): Promise<RemoteDocument[]>;
  /** merge=true shallow-merges into the existing document */
  set(collection: string, id: string, data: DocumentData, merge?: boolean): Promise<void>;
  delete(collection: string, id: string): Promise<void>;
  /** All-or-nothing. */
  batchCommit(ops: readonly BatchOperation[]): Promise<void>;
}

// ─── Identity Provider ──────────────────────────────────────

export interface IdentityProvider {
  currentIdentity(): string | null;
  /** Returns an unsubscribe function. */
  subscribe(onChange: (identity: string | null) => void): () => void;
}
