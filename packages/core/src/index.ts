/**
 * @strata/core
 *
 * Live sync for agent workspaces: records in, deduplicated entities out,
 * and builders for the records going the other way.
 */

// Records
export * from "./records/index.js";

// Entities
export * from "./entities/index.js";

// Merge store
export * from "./store/index.js";

// Subscriptions
export * from "./subscriptions/index.js";

// Presence
export * from "./presence/index.js";

// Builders
export * from "./builders/index.js";

// Transports
export * from "./transport/index.js";

// Session
export * from "./sync/index.js";

// Config
export * from "./config/index.js";
