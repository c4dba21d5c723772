/**
 * Filter matching and signatures
 */

import type { SyncRecord } from "../records/record.js";
import type { CachePolicy, RecordFilter } from "./types.js";

/**
 * Does a record satisfy every constraint of the filter?
 * An empty constraint list matches nothing; an absent one matches everything.
 */
export function matchesFilter(record: SyncRecord, filter: RecordFilter): boolean {
  if (filter.authors && !filter.authors.includes(record.creator)) return false;
  if (filter.kinds && !filter.kinds.includes(record.kind)) return false;
  if (filter.since !== undefined && record.createdAt < filter.since) return false;

  if (filter.tags) {
    for (const [key, accepted] of Object.entries(filter.tags)) {
      const hit = record.tags.some(
        (tag) => tag[0] === key && tag.length > 1 && accepted.includes(tag[1])
      );
      if (!hit) return false;
    }
  }

  return true;
}

function sortedUnique<T extends string | number>(values: readonly T[]): T[] {
  return Array.from(new Set(values)).sort((a, b) =>
    String(a).localeCompare(String(b), "en", { numeric: true })
  );
}

/**
 * Canonical key for a filter: two filters describing the same interest
 * produce the same signature regardless of ordering or duplicates.
 */
export function filterSignature(filter: RecordFilter, cachePolicy?: CachePolicy): string {
  const tagKeys = filter.tags ? Object.keys(filter.tags).sort() : [];

  const canonical = {
    authors: filter.authors ? sortedUnique(filter.authors) : null,
    kinds: filter.kinds ? sortedUnique(filter.kinds) : null,
    tags: tagKeys.map((key) => [key, sortedUnique(filter.tags?.[key] ?? [])]),
    since: filter.since ?? null,
    limit: filter.limit ?? null,
    cache: cachePolicy ?? null,
  };

  return JSON.stringify(canonical);
}

/**
 * Newest first, capped at `limit`.
 */
export function applyLimit(records: SyncRecord[], filter: RecordFilter): SyncRecord[] {
  const sorted = [...records].sort((a, b) => b.createdAt - a.createdAt);
  return filter.limit !== undefined ? sorted.slice(0, filter.limit) : sorted;
}
