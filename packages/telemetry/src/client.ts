/**
 * Telemetry client - PostHog wrapper with privacy controls
 *
 * Features:
 * - ON by default, opt-out via config
 * - Anonymous user ID (SHA-256 hashed creator)
 * - Graceful degradation (failures don't break the app)
 * - Singleton pattern for easy access
 *
 * Without an API key (STRATA_POSTHOG_API_KEY or the `apiKey` option) no
 * PostHog client is created and tracking is a no-op.
 */

import { PostHog } from "posthog-node";
import { loadTelemetryConfig, saveTelemetryConfig } from "./config.js";
import { getAnonymousUserId } from "./user-id.js";
import type { TelemetryEvent, TransportName } from "./events.js";

const POSTHOG_HOST = process.env.STRATA_POSTHOG_HOST || "https://us.i.posthog.com";

const LIB_NAME = "@strata/telemetry";
const LIB_VERSION = "0.1.0";

export interface TelemetryClientOptions {
  /** Override enabled state (ignores config) */
  enabled?: boolean;
  /** Force a specific user ID (for testing) */
  forceUserId?: string;
  /** PostHog API key override */
  apiKey?: string;
  /** PostHog host override */
  host?: string;
}

export class TelemetryClient {
  private client: PostHog | null = null;
  private userId: string;
  private enabled: boolean;
  private connector: string = "unknown";
  private readonly apiKey: string | undefined;
  private readonly host: string;

  constructor(options: TelemetryClientOptions = {}) {
    const config = loadTelemetryConfig();

    this.enabled = options.enabled ?? config.enabled;
    this.userId = options.forceUserId || config.anonymousId || getAnonymousUserId();
    this.apiKey = options.apiKey || process.env.STRATA_POSTHOG_API_KEY;
    this.host = options.host || POSTHOG_HOST;

    // Keep the ID stable across sessions
    if (!config.anonymousId && this.enabled) {
      saveTelemetryConfig({ ...config, anonymousId: this.userId });
    }

    if (this.enabled) {
      this.connect();
    }
  }

  private connect(): void {
    if (this.client || !this.apiKey) return;

    try {
      this.client = new PostHog(this.apiKey, {
        host: this.host,
        flushAt: 10,
        flushInterval: 5000,
      });
    } catch (error) {
      console.error("[telemetry] Failed to initialize PostHog:", error);
      this.enabled = false;
    }
  }

  /**
   * Set the connector name (e.g., "mcp-server")
   */
  setConnector(connector: string): void {
    this.connector = connector;
  }

  track(event: TelemetryEvent): void {
    if (!this.enabled || !this.client) {
      return;
    }

    try {
      this.client.capture({
        distinctId: this.userId,
        event: event.event,
        properties: {
          ...event.properties,
          $lib: LIB_NAME,
          $lib_version: LIB_VERSION,
          connector: this.connector,
        },
      });
    } catch (error) {
      console.error("[telemetry] Failed to track event:", error);
    }
  }

  trackToolCall(tool: string, success: boolean, durationMs?: number): void {
    this.track({
      event: "mcp.tool_called",
      properties: {
        tool,
        connector: this.connector,
        success,
        duration_ms: durationMs,
      },
    });
  }

  trackSessionStarted(transport: TransportName, canPublish: boolean): void {
    this.track({
      event: "sync.session_started",
      properties: { transport, can_publish: canPublish },
    });
  }

  /**
   * Track a publish attempt by record kind
   */
  trackRecordPublished(
    kind: number,
    success: boolean,
    destinations: number,
    errorCode?: string
  ): void {
    this.track({
      event: "sync.record_published",
      properties: { kind, success, destinations, error_code: errorCode },
    });
  }

  trackSubscriptionFailed(errorCode: string): void {
    this.track({
      event: "sync.subscription_failed",
      properties: { error_code: errorCode },
    });
  }

  /**
   * Opt out of telemetry
   */
  async disable(): Promise<void> {
    this.enabled = false;
    saveTelemetryConfig({ enabled: false, anonymousId: this.userId });
    await this.shutdown();
  }

  /**
   * Opt back into telemetry
   */
  enable(): void {
    this.enabled = true;
    saveTelemetryConfig({ enabled: true, anonymousId: this.userId });
    this.connect();
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  getUserId(): string {
    return this.userId;
  }

  /**
   * Flush pending events and close client
   * MUST be called before process exit
   */
  async shutdown(): Promise<void> {
    if (this.client) {
      const closing = this.client;
      this.client = null;
      try {
        await closing.shutdown();
      } catch (error) {
        console.error("[telemetry] Failed to shutdown:", error);
      }
    }
  }
}

// --- Singleton instance for convenience ---

let globalClient: TelemetryClient | null = null;

/**
 * Get the global telemetry client (singleton)
 */
export function getTelemetryClient(): TelemetryClient {
  if (!globalClient) {
    globalClient = new TelemetryClient();
  }
  return globalClient;
}

/**
 * Initialize telemetry with options
 * Call this early in your app to configure the client
 */
export function initTelemetry(options: TelemetryClientOptions = {}): TelemetryClient {
  globalClient = new TelemetryClient(options);
  return globalClient;
}

/**
 * Shutdown global telemetry client
 * Call before process exit to flush pending events
 */
export async function shutdownTelemetry(): Promise<void> {
  if (globalClient) {
    await globalClient.shutdown();
    globalClient = null;
  }
}

/**
 * Reset global client (for testing)
 */
export function resetTelemetryClient(): void {
  globalClient = null;
}
