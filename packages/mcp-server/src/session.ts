/**
 * Server session bootstrap
 *
 * Builds the SyncSession the tools share: Supabase when configured, the
 * in-process MemoryTransport otherwise, an identity signer when a creator
 * is configured, and telemetry reporting through the session hooks.
 */

import { createClient } from "@supabase/supabase-js";
import {
  MemoryTransport,
  SupabaseTransport,
  createIdentitySigner,
  createSyncSession,
  type SyncConfig,
  type SyncSession,
  type Transport,
} from "@strata/core";
import type { TelemetryClient, TransportName } from "@strata/telemetry";

export type SessionTelemetry = Pick<
  TelemetryClient,
  "trackRecordPublished" | "trackSubscriptionFailed" | "trackSessionStarted"
>;

export interface ServerSession {
  session: SyncSession;
  transport: Transport;
  transportName: TransportName;
}

function createTransport(config: SyncConfig): { transport: Transport; name: TransportName } {
  if (config.supabaseUrl && config.supabaseAnonKey) {
    const client = createClient(config.supabaseUrl, config.supabaseAnonKey, {
      auth: { persistSession: false },
    });
    return {
      transport: new SupabaseTransport({ client, table: config.recordsTable }),
      name: "supabase",
    };
  }

  console.error("[MCP] No Supabase credentials configured, using in-memory transport");
  return { transport: new MemoryTransport(), name: "memory" };
}

export function createServerSession(
  config: SyncConfig,
  telemetry: SessionTelemetry
): ServerSession {
  const { transport, name } = createTransport(config);
  const signer = config.creator ? createIdentitySigner(config.creator) : null;

  if (!signer) {
    console.error("[MCP] No creator configured, publishing tools are disabled");
  }

  const session = createSyncSession({
    transport,
    signer,
    settings: {
      collectTimeoutMs: config.collectTimeoutMs,
      replayBufferSize: config.replayBufferSize,
      statusFreshnessSeconds: config.statusFreshnessSeconds,
      defaultCachePolicy: config.defaultCachePolicy,
      debug: config.debug,
    },
    hooks: {
      onPublish: (event) =>
        telemetry.trackRecordPublished(
          event.kind,
          event.success,
          event.destinations,
          event.errorCode
        ),
      onSubscriptionError: (_signature, error) => telemetry.trackSubscriptionFailed(error.code),
    },
  });

  telemetry.trackSessionStarted(name, signer !== null);
  return { session, transport, transportName: name };
}
