export {
  DEFAULT_SYNC_CONFIG,
  SyncConfigSchema,
  getConfigDir,
  loadSyncConfig,
  saveSyncConfig,
  setConfigDir,
  type SyncConfig,
} from "./config.js";
