/**
 * Transport Module
 *
 * The pub/sub contract consumed by the sync core, plus the in-process and
 * Supabase implementations.
 */

export {
  CachePolicySchema,
  RecordFilterSchema,
  type CachePolicy,
  type RecordFilter,
  type RecordStream,
  type SubscribeOptions,
  type CollectOptions,
  type Transport,
  type Signer,
} from "./types.js";

export {
  SyncError,
  TransportNotConfiguredError,
  TransportUnavailableError,
  UnknownEntityError,
  isSyncError,
  toTransportError,
  type SyncErrorCode,
} from "./errors.js";

export { matchesFilter, filterSignature, applyLimit } from "./filter.js";
export { AsyncQueue } from "./async-queue.js";
export { RecordCache } from "./record-cache.js";
export { MemoryTransport, type MemoryTransportOptions } from "./memory-transport.js";
export {
  SupabaseTransport,
  RecordRowSchema,
  recordToRow,
  rowToRecord,
  type RecordRow,
  type SupabaseTransportOptions,
} from "./supabase-transport.js";
export { createIdentitySigner } from "./signer.js";
