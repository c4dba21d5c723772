/**
 * @strata/telemetry - Privacy-conscious analytics for Strata
 *
 * Usage:
 * ```typescript
 * import { getTelemetryClient, shutdownTelemetry } from "@strata/telemetry";
 *
 * const telemetry = getTelemetryClient();
 * telemetry.setConnector("mcp-server");
 * telemetry.trackToolCall("strata_projects", true, 42);
 *
 * // On process exit
 * await shutdownTelemetry();
 * ```
 */

export {
  TelemetryClient,
  getTelemetryClient,
  initTelemetry,
  shutdownTelemetry,
  resetTelemetryClient,
} from "./client.js";
export type { TelemetryClientOptions } from "./client.js";

export {
  TelemetryEventSchema,
  EVENT_TYPES,
  ToolCalledEventSchema,
  SessionStartedEventSchema,
  RecordPublishedEventSchema,
  SubscriptionFailedEventSchema,
  TransportNameSchema,
} from "./events.js";
export type { TelemetryEvent, EventType, TransportName } from "./events.js";

export {
  TelemetryConfigSchema,
  loadTelemetryConfig,
  saveTelemetryConfig,
  isTelemetryEnabled,
} from "./config.js";
export type { TelemetryConfig } from "./config.js";

export {
  getAnonymousUserId,
  hashForAnonymity,
  setConfigDir,
  getConfigDir,
} from "./user-id.js";
