/**
 * Anonymous user ID generation for telemetry
 *
 * The ID is a truncated SHA-256 of the configured sync creator (or the
 * host name when none is configured), so the same workstation reports
 * under the same ID without revealing which creator it signs as.
 */

import { createHash } from "crypto";
import { existsSync, readFileSync } from "fs";
import { homedir, hostname } from "os";
import { join } from "path";
import { z } from "zod";

let configDir = join(homedir(), ".strata");

/**
 * Override config directory (for testing)
 */
export function setConfigDir(dir: string): void {
  configDir = dir;
}

/**
 * Get current config directory
 */
export function getConfigDir(): string {
  return configDir;
}

const SyncCreatorSchema = z.object({
  sync: z.object({ creator: z.string().min(1).optional() }).optional(),
});

function configuredCreator(): string | undefined {
  const configFile = join(configDir, "config.json");
  if (!existsSync(configFile)) return undefined;

  try {
    const parsed = SyncCreatorSchema.safeParse(JSON.parse(readFileSync(configFile, "utf-8")));
    return parsed.success ? parsed.data.sync?.creator : undefined;
  } catch (error) {
    console.warn("[telemetry] Could not read config for user ID:", error);
    return undefined;
  }
}

/**
 * Generate a stable anonymous user ID.
 *
 * @returns 16-character hex string (SHA-256 truncated)
 */
export function getAnonymousUserId(): string {
  return hashForAnonymity(configuredCreator() ?? hostname());
}

/**
 * Deterministic anonymous hash for any identifier
 */
export function hashForAnonymity(input: string): string {
  const hash = createHash("sha256");
  hash.update(`strata:${input}`);
  return hash.digest("hex").slice(0, 16);
}
