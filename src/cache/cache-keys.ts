/**
 * cache-keys.ts — Cache key generation, TTL tiers and collection policy.
 *
 * Keys are deterministic strings built from owner + collection + sorted
 * query params, so equivalent queries share one cache entry and one
 * in-flight fetch. TTL tiers map to data volatility classes.
 */

import type { EntityQuery } from "../stores/types.js";

// ─── TTL Tiers (milliseconds) ───────────────────────────────

export const TTL = {
  /** Logs and inventories the user edits throughout the day. */
  SHORT: 5 * 60 * 1_000,              // 5 min

  /** Diary entries: refreshed by sync, moderate staleness OK. */
  STANDARD: 10 * 60 * 1_000,          // 10 min

  /** Preferences and plans — rarely change. */
  LONG: 60 * 60 * 1_000,              // 1 h
} as const;

export type TtlTier = keyof typeof TTL;

// ─── Collection Policy ──────────────────────────────────────

export interface CollectionPolicy {
  tier: TtlTier;
  /** Serve an expired cache entry when the remote fetch fails */
  allowStale: boolean;
}

export const COLLECTIONS = {
  foodEntries: { tier: "STANDARD", allowStale: false },
  useByInventory: { tier: "SHORT", allowStale: false },
  weightHistory: { tier: "STANDARD", allowStale: false },
  fastingSessions: { tier: "SHORT", allowStale: false },
  fastingPlans: { tier: "LONG", allowStale: false },
  reactionLogs: { tier: "STANDARD", allowStale: false },
  favoriteFoods: { tier: "LONG", allowStale: true },
  settings: { tier: "LONG", allowStale: true },
  allergens: { tier: "SHORT", allowStale: true },
} as const satisfies Record<string, CollectionPolicy>;

export type CollectionName = keyof typeof COLLECTIONS;

function isKnownCollection(collection: string): collection is CollectionName {
  return Object.prototype.hasOwnProperty.call(COLLECTIONS, collection);
}

export const COLLECTION_NAMES: readonly CollectionName[] = Object.keys(COLLECTIONS).filter(isKnownCollection);

export function policyFor(collection: string): CollectionPolicy | undefined {
  return isKnownCollection(collection) ? COLLECTIONS[collection] : undefined;
}

/** TTL for a collection; unknown collections get the configured default. */
export function ttlFor(collection: string, fallbackMs: number): number {
  const policy = policyFor(collection);
  return policy ? TTL[policy.tier] : fallbackMs;
}

export function allowsStale(collection: string): boolean {
  return policyFor(collection)?.allowStale ?? false;
}

// ─── Key Construction ───────────────────────────────────────

/**
 * Build a deterministic cache key for an owner-scoped query.
 *
 *   cacheKey("u1", { collection: "foodEntries", range: { field: "date", from: "2026-01-01", to: "2026-01-02" } })
 *   → "u1:foodEntries?from=2026-01-01&range=date&to=2026-01-02"
 *
 *   cacheKey("u1", { collection: "settings", id: "prefs" })
 *   → "u1:settings:prefs"
 */
export function cacheKey(ownerId: string, query: EntityQuery): string {
  let base = `${ownerId}:${query.collection}`;
  if (query.id !== undefined) base += `:${query.id}`;

  const params: Record<string, unknown> = {};
  if (query.range) {
    params.range = query.range.field;
    params.from = query.range.from;
    params.to = query.range.to;
  }
  for (const filter of query.filters ?? []) {
    params[`${filter.field}[${filter.op}]`] = filter.value;
  }
  if (query.orderBy) params.order = `${query.orderBy.field}:${query.orderBy.direction ?? "asc"}`;
  if (query.limit !== undefined) params.limit = query.limit;

  const sorted = Object.entries(params)
    .filter(([, v]) => v != null && v !== "")
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}=${String(v)}`)
    .join("&");

  return sorted ? `${base}?${sorted}` : base;
}

/**
 * Pattern matching every key of one owner's collection.
 * Patterns ending with `*` match the base key and its `:id` / `?params` continuations.
 */
export function collectionPattern(ownerId: string, collection: string): string {
  return `${ownerId}:${collection}*`;
}

/** Whether `key` is `base` or continues it with an id or query segment. */
export function isUnderBase(key: string, base: string): boolean {
  if (!key.startsWith(base)) return false;
  if (key.length === base.length) return true;
  const next = key[base.length];
  return next === ":" || next === "?";
}

/** Whether a key matches an exact or `*`-suffixed collection pattern. */
export function matchesPattern(key: string, pattern: string): boolean {
  if (pattern.endsWith("*")) return isUnderBase(key, pattern.slice(0, -1));
  return key === pattern;
}
