/**
 * Tag lookup
 *
 * Tags are string arrays keyed by their first element. Lookups never throw:
 * missing or short groups resolve to undefined / empty lists.
 */

import type { SyncRecord } from "./record.js";

type Tagged = Pick<SyncRecord, "tags">;

/** Marker placed in the fourth slot of an `e` tag to mark an in-place update */
export const UPDATE_MARKER = "update";

/**
 * First tag group with the given key.
 */
export function findTag(record: Tagged, key: string): string[] | undefined {
  return record.tags.find((tag) => tag[0] === key);
}

/**
 * Second element of the first group with the given key.
 */
export function tagValue(record: Tagged, key: string): string | undefined {
  const tag = findTag(record, key);
  return tag && tag.length > 1 ? tag[1] : undefined;
}

/**
 * Like tagValue, but treats an empty string as absent.
 */
export function nonEmptyTagValue(record: Tagged, key: string): string | undefined {
  const value = tagValue(record, key);
  return value ? value : undefined;
}

/**
 * Second element of every group with the given key, in tag order.
 */
export function tagValues(record: Tagged, key: string): string[] {
  const values: string[] = [];
  for (const tag of record.tags) {
    if (tag[0] === key && tag.length > 1) {
      values.push(tag[1]);
    }
  }
  return values;
}

/**
 * Target of an update marker (`["e", id, "", "update"]`), if any.
 */
export function updateTarget(record: Tagged): string | undefined {
  const tag = record.tags.find(
    (t) => t[0] === "e" && t.length > 3 && t[3] === UPDATE_MARKER && t[1] !== ""
  );
  return tag ? tag[1] : undefined;
}

/**
 * First `e` reference that is not an update marker.
 */
export function eventReference(record: Tagged): string | undefined {
  const tag = record.tags.find(
    (t) => t[0] === "e" && t.length > 1 && t[3] !== UPDATE_MARKER
  );
  return tag ? tag[1] : undefined;
}

/**
 * Record identity an append-only record applies to: its update target, or itself.
 */
export function recordIdentity(record: SyncRecord): string {
  return updateTarget(record) ?? record.id;
}

// --- Addressable identities ---

export interface AddressParts {
  kind: number;
  creator: string;
  slug: string;
}

export function formatAddress(kind: number, creator: string, slug: string): string {
  return `${kind}:${creator}:${slug}`;
}

/**
 * Normalize an `a` reference to `kind:creator:slug`, dropping any relay hint
 * after the third segment. Values with fewer segments are returned unchanged.
 */
export function parseAddress(value: string): string {
  const segments = value.split(":");
  if (segments.length < 3) return value;
  return segments.slice(0, 3).join(":");
}

export function splitAddress(value: string): AddressParts | null {
  const segments = parseAddress(value).split(":");
  if (segments.length !== 3) return null;

  const kind = Number(segments[0]);
  if (!Number.isInteger(kind) || segments[1] === "") return null;

  return { kind, creator: segments[1], slug: segments[2] };
}

/**
 * Normalized value of the first `a` tag, or "" when absent.
 */
export function addressReference(record: Tagged): string {
  const value = tagValue(record, "a");
  return value ? parseAddress(value) : "";
}
