/**
 * Sync Module
 *
 * Session facade over the transport, stores, reducers and orchestrator.
 */

export {
  createSyncSession,
  initSyncSession,
  getSyncSession,
  type PublishEvent,
  type ProjectWatch,
  type SessionSettings,
  type SyncSession,
  type SyncSessionHooks,
  type SyncSessionOptions,
  type SyncStores,
} from "./session.js";
