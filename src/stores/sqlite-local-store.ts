/**
 * sqlite-local-store.ts — Local persistent store on SQLite
 *
 * One database holds every owner's entities and pending journal, keyed by
 * owner_id. forOwner() hands out a store that only ever sees its owner's
 * rows, so a sign-in never exposes the previous user's offline data.
 *
 * Entity data is stored as JSON text; range selectors filter with
 * json_extract on a whitelisted field name.
 */

import Database from "better-sqlite3";
import * as fs from "node:fs";
import * as path from "node:path";
import { TerminalError } from "../errors.js";
import { log } from "../logger.js";
import type {
  DocumentData,
  Entity,
  LocalSelector,
  LocalStoreFactory,
  OwnerScopedStore,
  PendingJournal,
  PendingKind,
  PendingOperation,
} from "./types.js";

// ─── Schema ─────────────────────────────────────────────────

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS entities (
    owner_id    TEXT NOT NULL,
    collection  TEXT NOT NULL,
    id          TEXT NOT NULL,
    data        TEXT NOT NULL,
    updated_at  INTEGER NOT NULL,
    PRIMARY KEY (owner_id, collection, id)
  );

  CREATE TABLE IF NOT EXISTS pending_operations (
    owner_id      TEXT NOT NULL,
    op_id         TEXT NOT NULL,
    collection    TEXT NOT NULL,
    entity_id     TEXT NOT NULL,
    kind          TEXT NOT NULL CHECK (kind IN ('create', 'update', 'delete')),
    payload       TEXT,
    submitted_at  INTEGER NOT NULL,
    attempts      INTEGER NOT NULL DEFAULT 0,
    last_error    TEXT,
    PRIMARY KEY (owner_id, op_id)
  );

  CREATE INDEX IF NOT EXISTS idx_pending_owner
    ON pending_operations(owner_id, submitted_at);
`;

const FIELD_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

const PENDING_KINDS: readonly PendingKind[] = ["create", "update", "delete"];

export interface SqliteLocalStoreFactory extends LocalStoreFactory {
  /** Row counts across all owners (diagnostics). */
  counts(): { entities: number; pending: number };
}

// ─── Row Mapping ────────────────────────────────────────────

function parseData(raw: unknown): DocumentData {
  const parsed: unknown = JSON.parse(String(raw));
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) return {};
  return Object.fromEntries(Object.entries(parsed));
}

function toKind(raw: unknown): PendingKind {
  const kind = PENDING_KINDS.find((k) => k === raw);
  if (!kind) throw new TerminalError("invalid-argument", `Corrupt pending operation kind: ${String(raw)}`);
  return kind;
}

function rowToEntity(row: Record<string, unknown>): Entity {
  return {
    id: row.id as string,
    collection: row.collection as string,
    data: parseData(row.data),
    updatedAt: row.updated_at as number,
  };
}

function rowToOperation(row: Record<string, unknown>): PendingOperation {
  return {
    opId: row.op_id as string,
    collection: row.collection as string,
    entityId: row.entity_id as string,
    kind: toKind(row.kind),
    payload: row.payload === null ? null : parseData(row.payload),
    submittedAt: row.submitted_at as number,
    attempts: row.attempts as number,
    lastError: (row.last_error as string | null) ?? null,
  };
}

// ─── Implementation ─────────────────────────────────────────

/**
 * Open (or create) the local SQLite database.
 *
 * @param dbPath — Database file, or ":memory:" for tests.
 */
export function createSqliteLocalStore(dbPath: string): SqliteLocalStoreFactory {
  if (dbPath !== ":memory:") {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.exec(SCHEMA);

  // ── Prepared Statements ─────────────────────────────────

  const stmts = {
    upsert: db.prepare(`
      INSERT INTO entities (owner_id, collection, id, data, updated_at)
      VALUES (@ownerId, @collection, @id, @data, @updatedAt)
      ON CONFLICT (owner_id, collection, id)
      DO UPDATE SET data = excluded.data, updated_at = excluded.updated_at
    `),
    getById: db.prepare(`
      SELECT * FROM entities WHERE owner_id = ? AND collection = ? AND id = ?
    `),
    listCollection: db.prepare(`
      SELECT * FROM entities WHERE owner_id = ? AND collection = ? ORDER BY updated_at, id
    `),
    deleteById: db.prepare(`
      DELETE FROM entities WHERE owner_id = ? AND collection = ? AND id = ?
    `),
    loadPending: db.prepare(`
      SELECT * FROM pending_operations WHERE owner_id = ? ORDER BY submitted_at, op_id
    `),
    clearPending: db.prepare(`
      DELETE FROM pending_operations WHERE owner_id = ?
    `),
    insertPending: db.prepare(`
      INSERT INTO pending_operations
        (owner_id, op_id, collection, entity_id, kind, payload, submitted_at, attempts, last_error)
      VALUES
        (@ownerId, @opId, @collection, @entityId, @kind, @payload, @submittedAt, @attempts, @lastError)
    `),
    countEntities: db.prepare(`SELECT COUNT(*) AS n FROM entities`),
    countPending: db.prepare(`SELECT COUNT(*) AS n FROM pending_operations`),
  };

  const replacePending = db.transaction((ownerId: string, ops: readonly PendingOperation[]) => {
    stmts.clearPending.run(ownerId);
    for (const op of ops) {
      stmts.insertPending.run({
        ownerId,
        opId: op.opId,
        collection: op.collection,
        entityId: op.entityId,
        kind: op.kind,
        payload: op.payload === null ? null : JSON.stringify(op.payload),
        submittedAt: op.submittedAt,
        attempts: op.attempts,
        lastError: op.lastError,
      });
    }
  });

  function rangeQuery(ownerId: string, collection: string, selector: LocalSelector): Entity[] {
    const range = selector.range;
    if (!range) return [];
    if (!FIELD_NAME.test(range.field)) {
      throw new TerminalError("invalid-argument", `Invalid range field: ${range.field}`);
    }
    const jsonPath = `$.${range.field}`;
    const clauses = ["owner_id = ?", "collection = ?"];
    const params: (string | number)[] = [ownerId, collection];
    if (selector.id !== undefined) {
      clauses.push("id = ?");
      params.push(selector.id);
    }
    if (range.from !== undefined) {
      clauses.push("json_extract(data, ?) >= ?");
      params.push(jsonPath, range.from);
    }
    if (range.to !== undefined) {
      clauses.push("json_extract(data, ?) < ?");
      params.push(jsonPath, range.to);
    }
    const sql = `SELECT * FROM entities WHERE ${clauses.join(" AND ")} ORDER BY json_extract(data, ?), id`;
    const rows = db.prepare(sql).all(...params, jsonPath) as Record<string, unknown>[];
    return rows.map(rowToEntity);
  }

  function scoped(ownerId: string): OwnerScopedStore {
    const journal: PendingJournal = {
      load(): PendingOperation[] {
        const rows = stmts.loadPending.all(ownerId) as Record<string, unknown>[];
        return rows.map(rowToOperation);
      },
      save(ops: readonly PendingOperation[]): void {
        replacePending(ownerId, ops);
      },
    };

    return {
      ownerId,
      journal,

      async save(entity: Entity): Promise<void> {
        stmts.upsert.run({
          ownerId,
          collection: entity.collection,
          id: entity.id,
          data: JSON.stringify(entity.data),
          updatedAt: entity.updatedAt,
        });
      },

      async get(collection: string, selector: LocalSelector = {}): Promise<Entity[]> {
        if (selector.range) return rangeQuery(ownerId, collection, selector);
        if (selector.id !== undefined) {
          const row = stmts.getById.get(ownerId, collection, selector.id) as Record<string, unknown> | undefined;
          return row ? [rowToEntity(row)] : [];
        }
        const rows = stmts.listCollection.all(ownerId, collection) as Record<string, unknown>[];
        return rows.map(rowToEntity);
      },

      async delete(collection: string, id: string): Promise<boolean> {
        return stmts.deleteById.run(ownerId, collection, id).changes > 0;
      },

      async list(collection: string): Promise<Entity[]> {
        const rows = stmts.listCollection.all(ownerId, collection) as Record<string, unknown>[];
        return rows.map(rowToEntity);
      },
    };
  }

  log.store.debug({ dbPath }, "sqlite:open");

  return {
    forOwner(ownerId: string): OwnerScopedStore {
      return scoped(ownerId);
    },

    counts() {
      const entities = stmts.countEntities.get() as { n: number };
      const pending = stmts.countPending.get() as { n: number };
      return { entities: entities.n, pending: pending.n };
    },

    close(): void {
      db.close();
    },
  };
}
