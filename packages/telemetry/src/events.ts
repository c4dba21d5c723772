/**
 * Telemetry event type definitions with Zod schemas
 *
 * PRIVACY: These events track metadata only, NEVER content.
 * Record kinds and counts are reported; record content, tags and
 * creator ids are not.
 */

import { z } from "zod";

export const TransportNameSchema = z.enum(["supabase", "memory"]);

// --- Adoption ---

export const ToolCalledEventSchema = z.object({
  event: z.literal("mcp.tool_called"),
  properties: z.object({
    tool: z.string(),
    connector: z.string(),
    duration_ms: z.number().optional(),
    success: z.boolean(),
  }),
});

export const SessionStartedEventSchema = z.object({
  event: z.literal("sync.session_started"),
  properties: z.object({
    transport: TransportNameSchema,
    can_publish: z.boolean(),
  }),
});

// --- Sync health ---

export const RecordPublishedEventSchema = z.object({
  event: z.literal("sync.record_published"),
  properties: z.object({
    kind: z.number().int(),
    success: z.boolean(),
    destinations: z.number().int().nonnegative(),
    error_code: z.string().optional(),
  }),
});

export const SubscriptionFailedEventSchema = z.object({
  event: z.literal("sync.subscription_failed"),
  properties: z.object({
    error_code: z.string(),
  }),
});

// --- Union type for all events ---

export const TelemetryEventSchema = z.discriminatedUnion("event", [
  ToolCalledEventSchema,
  SessionStartedEventSchema,
  RecordPublishedEventSchema,
  SubscriptionFailedEventSchema,
]);

export type TelemetryEvent = z.infer<typeof TelemetryEventSchema>;

export type TransportName = z.infer<typeof TransportNameSchema>;

export type EventType = TelemetryEvent["event"];

export const EVENT_TYPES = {
  TOOL_CALLED: "mcp.tool_called",
  SESSION_STARTED: "sync.session_started",
  RECORD_PUBLISHED: "sync.record_published",
  SUBSCRIPTION_FAILED: "sync.subscription_failed",
} as const;
