/**
 * Sync configuration
 *
 * Reads/writes the `sync` section of ~/.strata/config.json. Environment
 * variables override file values; an unreadable or invalid file falls back
 * to defaults.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { z } from "zod";
import { CachePolicySchema } from "../transport/types.js";

// Config directory (can be overridden for testing)
let configDir = join(homedir(), ".strata");

/**
 * Set the config directory (for testing)
 */
export function setConfigDir(dir: string): void {
  configDir = dir;
}

export function getConfigDir(): string {
  return configDir;
}

function getConfigFile(): string {
  return join(configDir, "config.json");
}

// --- Schema ---

export const SyncConfigSchema = z.object({
  supabaseUrl: z.string().url().optional(),
  supabaseAnonKey: z.string().min(1).optional(),
  /** Creator id records are signed as */
  creator: z.string().min(1).optional(),
  recordsTable: z.string().min(1).default("records"),
  collectTimeoutMs: z.number().int().positive().default(5000),
  replayBufferSize: z.number().int().nonnegative().default(500),
  statusFreshnessSeconds: z.number().int().positive().default(120),
  defaultCachePolicy: CachePolicySchema.default("cacheThenNetwork"),
  debug: z.boolean().default(false),
});

export type SyncConfig = z.infer<typeof SyncConfigSchema>;

export const DEFAULT_SYNC_CONFIG: SyncConfig = SyncConfigSchema.parse({});

// --- File ---

function readConfigFile(): Record<string, unknown> {
  const configFile = getConfigFile();
  if (!existsSync(configFile)) return {};

  try {
    const data: unknown = JSON.parse(readFileSync(configFile, "utf-8"));
    return z.record(z.unknown()).catch({}).parse(data);
  } catch (err) {
    console.warn(`[Config] Ignoring unreadable ${configFile}:`, err);
    return {};
  }
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (env.STRATA_SUPABASE_URL) overrides.supabaseUrl = env.STRATA_SUPABASE_URL;
  if (env.STRATA_SUPABASE_ANON_KEY) overrides.supabaseAnonKey = env.STRATA_SUPABASE_ANON_KEY;
  if (env.STRATA_CREATOR) overrides.creator = env.STRATA_CREATOR;
  if (env.STRATA_RECORDS_TABLE) overrides.recordsTable = env.STRATA_RECORDS_TABLE;
  if (env.STRATA_DEBUG) overrides.debug = env.STRATA_DEBUG === "1" || env.STRATA_DEBUG === "true";
  return overrides;
}

/**
 * Load sync configuration with defaults and environment overrides applied.
 */
export function loadSyncConfig(env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const section = z.record(z.unknown()).catch({}).parse(readConfigFile().sync ?? {});

  const fromFile = SyncConfigSchema.safeParse(section);
  if (!fromFile.success) {
    console.warn("[Config] Invalid sync config, using defaults:", fromFile.error.message);
  }
  const base = fromFile.success ? fromFile.data : DEFAULT_SYNC_CONFIG;

  const merged = SyncConfigSchema.safeParse({ ...base, ...envOverrides(env) });
  if (!merged.success) {
    console.warn("[Config] Ignoring invalid environment overrides:", merged.error.message);
    return base;
  }
  return merged.data;
}

/**
 * Save the sync section, preserving other settings in the file.
 */
export function saveSyncConfig(config: Partial<SyncConfig>): void {
  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true, mode: 0o700 });
  }

  const existing = readConfigFile();
  existing.sync = SyncConfigSchema.parse(config);
  writeFileSync(getConfigFile(), JSON.stringify(existing, null, 2), { mode: 0o600 });
}
