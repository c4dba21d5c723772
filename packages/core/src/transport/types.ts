/**
 * Transport contract
 *
 * The sync core treats the pub/sub client as a black box that can
 * subscribe, collect once and publish over record filters.
 */

import { z } from "zod";
import type { RecordDraft, SyncRecord } from "../records/record.js";

// --- Cache policy ---

export const CachePolicySchema = z.enum([
  "cacheOnly",        // local cache, no network
  "networkOnly",      // network history and live delivery
  "cacheThenNetwork", // cache first, then network
]);

export type CachePolicy = z.infer<typeof CachePolicySchema>;

// --- Filters ---

export const RecordFilterSchema = z.object({
  authors: z.array(z.string()).optional(),
  kinds: z.array(z.number().int()).optional(),
  /** Tag key -> accepted values (any match) */
  tags: z.record(z.array(z.string())).optional(),
  since: z.number().int().optional(),
  limit: z.number().int().positive().optional(),
});

export type RecordFilter = z.infer<typeof RecordFilterSchema>;

// --- Streams ---

/**
 * A continuous stream of records. Never ends on its own; `close()` ends
 * iteration and releases the underlying subscription.
 */
export interface RecordStream extends AsyncIterable<SyncRecord> {
  close: () => void;
}

export interface SubscribeOptions {
  cachePolicy: CachePolicy;
}

export interface CollectOptions {
  cachePolicy: CachePolicy;
  timeoutMs: number;
}

export interface Transport {
  subscribe: (filter: RecordFilter, options: SubscribeOptions) => RecordStream;
  collectOnce: (filter: RecordFilter, options: CollectOptions) => Promise<SyncRecord[]>;
  /** Resolves with the destinations that acknowledged receipt */
  publish: (record: SyncRecord) => Promise<Set<string>>;
}

// --- Signing ---

export interface Signer {
  readonly creator: string;
  sign: (draft: RecordDraft) => Promise<SyncRecord>;
}
