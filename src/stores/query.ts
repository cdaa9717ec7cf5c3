/**
 * query.ts — In-memory evaluation of filters, ranges, order and limit.
 *
 * Used on local results (the local store only indexes by id and range)
 * and by in-process remote stand-ins.
 */

import type { DocumentData, EntityQuery, FieldValue, QueryFilter, QueryOrder, RangeSelector } from "./types.js";

/** Comparable view of a document field; anything else sorts as null. */
function fieldOf(data: DocumentData, field: string): FieldValue {
  const value = data[field];
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return value;
  return null;
}

/** null < booleans < numbers < strings; same-type values compare naturally. */
export function compareValues(a: FieldValue, b: FieldValue): number {
  const rank = (v: FieldValue): number =>
    v === null ? 0 : typeof v === "boolean" ? 1 : typeof v === "number" ? 2 : 3;
  const ra = rank(a);
  const rb = rank(b);
  if (ra !== rb) return ra - rb;
  if (typeof a === "number" && typeof b === "number") return Math.sign(a - b);
  if (typeof a === "string" && typeof b === "string") return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === "boolean" && typeof b === "boolean") return Number(a) - Number(b);
  return 0;
}

export function matchesFilter(data: DocumentData, filter: QueryFilter): boolean {
  const cmp = compareValues(fieldOf(data, filter.field), filter.value);
  switch (filter.op) {
    case "==": return cmp === 0;
    case "!=": return cmp !== 0;
    case "<": return cmp < 0;
    case "<=": return cmp <= 0;
    case ">": return cmp > 0;
    case ">=": return cmp >= 0;
  }
}

export function inRange(data: DocumentData, range: RangeSelector): boolean {
  const value = fieldOf(data, range.field);
  if (range.from !== undefined && compareValues(value, range.from) < 0) return false;
  if (range.to !== undefined && compareValues(value, range.to) >= 0) return false;
  return true;
}

/** Range and filters as remote query filters. */
export function toRemoteFilters(query: EntityQuery): QueryFilter[] {
  const filters: QueryFilter[] = [...(query.filters ?? [])];
  if (query.range?.from !== undefined) {
    filters.push({ field: query.range.field, op: ">=", value: query.range.from });
  }
  if (query.range?.to !== undefined) {
    filters.push({ field: query.range.field, op: "<", value: query.range.to });
  }
  return filters;
}

/**
 * Apply filters, order and limit to a list of records.
 * Stable with respect to input order for equal sort keys.
 */
export function applyQuery<T>(
  records: readonly T[],
  dataOf: (record: T) => DocumentData,
  filters: readonly QueryFilter[] = [],
  order?: QueryOrder,
  limit?: number,
): T[] {
  let out = records.filter((r) => filters.every((f) => matchesFilter(dataOf(r), f)));
  if (order) {
    const sign = order.direction === "desc" ? -1 : 1;
    out = [...out].sort(
      (a, b) => sign * compareValues(fieldOf(dataOf(a), order.field), fieldOf(dataOf(b), order.field)),
    );
  }
  return limit !== undefined ? out.slice(0, limit) : out;
}
