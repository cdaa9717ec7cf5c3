/**
 * postgres-remote-store.ts — Remote document store on PostgreSQL (JSONB)
 *
 * Documents live in one table keyed by (path, id), where path is the
 * owner-scoped collection path (users/{ownerId}/{collection}).
 *
 * Filters compare JSONB values (`data -> field`), so numbers compare
 * numerically and strings lexically, matching the local store.
 *
 * Pattern:
 *   const pool = createPool(config.databaseUrl);
 *   const remote = await createPostgresRemoteStore(pool);
 */

import pg from "pg";
import { TerminalError } from "../errors.js";
import { log } from "../logger.js";
import type { BatchOperation, DocumentData, FilterOp, QueryFilter, QueryOrder, RemoteDocument, RemoteStore } from "./types.js";

const { Pool } = pg;
type Pool = pg.Pool;
type PoolClient = pg.PoolClient;

export type { Pool, PoolClient };

// ─── Schema ─────────────────────────────────────────────────

const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS documents (
    path        TEXT NOT NULL,
    id          TEXT NOT NULL,
    data        JSONB NOT NULL,
    updated_at  TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    PRIMARY KEY (path, id)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_documents_path ON documents (path)`,
];

// ─── SQL ────────────────────────────────────────────────────

const SQL = {
  get: `SELECT id, data FROM documents WHERE path = $1 AND id = $2`,
  upsert: `INSERT INTO documents (path, id, data, updated_at)
    VALUES ($1, $2, $3::jsonb, NOW())
    ON CONFLICT (path, id) DO UPDATE SET
      data = CASE WHEN $4::boolean THEN documents.data || EXCLUDED.data ELSE EXCLUDED.data END,
      updated_at = NOW()`,
  delete: `DELETE FROM documents WHERE path = $1 AND id = $2`,
};

const SQL_OPS: Record<FilterOp, string> = {
  "==": "=",
  "!=": "<>",
  "<": "<",
  "<=": "<=",
  ">": ">",
  ">=": ">=",
};

// ─── Connection ─────────────────────────────────────────────

/**
 * Create a connection pool.
 *
 * @param connectionString — Postgres URL (DataCoreConfig.databaseUrl)
 */
export function createPool(connectionString: string): Pool {
  const pool = new Pool({
    connectionString,
    max: 5,
    connectionTimeoutMillis: 5000,  // fail after 5s if no connection available
    idleTimeoutMillis: 30000,       // release idle clients after 30s
  });

  // Unhandled idle-client errors crash the process
  pool.on("error", (err) => {
    log.store.error({ err }, "pg:idle-client-error");
  });

  return pool;
}

/**
 * Execute a callback inside a transaction.
 * Commits on success, rolls back on error.
 */
export async function withTransaction<T>(
  pool: Pool,
  fn: (client: PoolClient) => Promise<T>,
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (e) {
    await client.query("ROLLBACK");
    throw e;
  } finally {
    client.release();
  }
}

// ─── Query Building ─────────────────────────────────────────

/**
 * Build the SELECT for a collection query.
 * Field names travel as parameters (`data -> $n::text`), never as SQL text.
 */
export function buildQuery(
  path: string,
  filters: readonly QueryFilter[] = [],
  order?: QueryOrder,
  limit?: number,
): { text: string; values: unknown[] } {
  const values: unknown[] = [path];
  const where = ["path = $1"];

  for (const filter of filters) {
    values.push(filter.field, JSON.stringify(filter.value));
    where.push(`data -> $${values.length - 1}::text ${SQL_OPS[filter.op]} $${values.length}::jsonb`);
  }

  let text = `SELECT id, data FROM documents WHERE ${where.join(" AND ")}`;
  if (order) {
    values.push(order.field);
    text += ` ORDER BY data -> $${values.length}::text ${order.direction === "desc" ? "DESC" : "ASC"}, id`;
  } else {
    text += " ORDER BY id";
  }
  if (limit !== undefined) {
    if (!Number.isInteger(limit) || limit < 0) {
      throw new TerminalError("invalid-argument", `Invalid limit: ${limit}`);
    }
    values.push(limit);
    text += ` LIMIT $${values.length}`;
  }
  return { text, values };
}

function mapRow(row: Record<string, unknown>): RemoteDocument {
  const data = row.data;
  return {
    id: row.id as string,
    data: typeof data === "object" && data !== null && !Array.isArray(data)
      ? Object.fromEntries(Object.entries(data))
      : {},
  };
}

// ─── Store ──────────────────────────────────────────────────

export async function createPostgresRemoteStore(pool: Pool): Promise<RemoteStore> {
  await withTransaction(pool, async (client) => {
    for (const stmt of SCHEMA_STATEMENTS) {
      await client.query(stmt);
    }
  });
  log.store.debug("pg:schema-ready");

  return {
    async get(collection: string, id: string): Promise<RemoteDocument | null> {
      const result = await pool.query(SQL.get, [collection, id]);
      const row: Record<string, unknown> | undefined = result.rows[0];
      return row ? mapRow(row) : null;
    },

    async query(
      collection: string,
      filters?: readonly QueryFilter[],
      order?: QueryOrder,
      limit?: number,
    ): Promise<RemoteDocument[]> {
      const { text, values } = buildQuery(collection, filters, order, limit);
      const result = await pool.query(text, values);
      return result.rows.map(mapRow);
    },

    async set(collection: string, id: string, data: DocumentData, merge = false): Promise<void> {
      await pool.query(SQL.upsert, [collection, id, JSON.stringify(data), merge]);
    },

    async delete(collection: string, id: string): Promise<void> {
      await pool.query(SQL.delete, [collection, id]);
    },

    async batchCommit(ops: readonly BatchOperation[]): Promise<void> {
      if (ops.length === 0) return;
      await withTransaction(pool, async (client) => {
        for (const op of ops) {
          if (op.type === "delete") {
            await client.query(SQL.delete, [op.collection, op.id]);
          } else {
            await client.query(SQL.upsert, [op.collection, op.id, JSON.stringify(op.data), op.merge ?? false]);
          }
        }
      });
      log.store.debug({ ops: ops.length }, "pg:batch-commit");
    },
  };
}
