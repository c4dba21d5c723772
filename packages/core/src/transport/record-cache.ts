/**
 * Record Cache
 *
 * In-memory cache of records a transport has already delivered, used to
 * serve `cacheOnly` and `cacheThenNetwork` requests. Ephemeral kinds are
 * never cached. Oldest entries are evicted past `maxEntries`.
 */

import type { SyncRecord } from "../records/record.js";
import { isEphemeralKind } from "../records/kinds.js";
import { applyLimit, matchesFilter } from "./filter.js";
import type { RecordFilter } from "./types.js";

const DEFAULT_MAX_ENTRIES = 5000;

export class RecordCache {
  private records = new Map<string, SyncRecord>();

  constructor(private readonly maxEntries: number = DEFAULT_MAX_ENTRIES) {}

  /**
   * Returns true when the record was not cached before.
   */
  put(record: SyncRecord): boolean {
    if (isEphemeralKind(record.kind)) return false;
    if (this.records.has(record.id)) return false;

    this.records.set(record.id, record);
    while (this.records.size > this.maxEntries) {
      const oldest = this.records.keys().next();
      if (oldest.done) break;
      this.records.delete(oldest.value);
    }
    return true;
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  query(filter: RecordFilter): SyncRecord[] {
    const matches = Array.from(this.records.values()).filter((r) =>
      matchesFilter(r, filter)
    );
    return applyLimit(matches, filter);
  }

  get size(): number {
    return this.records.size;
  }

  clear(): void {
    this.records.clear();
  }
}
