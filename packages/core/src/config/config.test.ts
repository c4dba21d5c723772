import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, mkdirSync, readFileSync, rmSync, statSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import {
  DEFAULT_SYNC_CONFIG,
  getConfigDir,
  loadSyncConfig,
  saveSyncConfig,
  setConfigDir,
} from "./config.js";

const TEST_DIR = join(tmpdir(), `strata-config-test-${Date.now()}`);
const CONFIG_FILE = join(TEST_DIR, "config.json");

describe("sync config", () => {
  beforeEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true });
    }
    mkdirSync(TEST_DIR, { recursive: true });
    setConfigDir(TEST_DIR);
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true });
    }
    vi.restoreAllMocks();
  });

  it("uses defaults when no file exists", () => {
    expect(getConfigDir()).toBe(TEST_DIR);
    expect(loadSyncConfig({})).toEqual({
      recordsTable: "records",
      collectTimeoutMs: 5000,
      replayBufferSize: 500,
      statusFreshnessSeconds: 120,
      defaultCachePolicy: "cacheThenNetwork",
      debug: false,
    });
    expect(DEFAULT_SYNC_CONFIG.recordsTable).toBe("records");
  });

  it("reads the sync section", () => {
    writeFileSync(
      CONFIG_FILE,
      JSON.stringify({
        sync: { supabaseUrl: "https://example.supabase.co", creator: "pk1", statusFreshnessSeconds: 60 },
      })
    );

    const config = loadSyncConfig({});

    expect(config.supabaseUrl).toBe("https://example.supabase.co");
    expect(config.creator).toBe("pk1");
    expect(config.statusFreshnessSeconds).toBe(60);
    expect(config.collectTimeoutMs).toBe(5000);
  });

  it("applies environment overrides", () => {
    writeFileSync(CONFIG_FILE, JSON.stringify({ sync: { creator: "pk1" } }));

    const config = loadSyncConfig({
      STRATA_CREATOR: "pk2",
      STRATA_SUPABASE_ANON_KEY: "test-anon-key",
      STRATA_RECORDS_TABLE: "sync_records",
      STRATA_DEBUG: "true",
    });

    expect(config.creator).toBe("pk2");
    expect(config.supabaseAnonKey).toBe("test-anon-key");
    expect(config.recordsTable).toBe("sync_records");
    expect(config.debug).toBe(true);
  });

  it("treats other debug values as off", () => {
    expect(loadSyncConfig({ STRATA_DEBUG: "yes" }).debug).toBe(false);
  });

  it("ignores an invalid environment override", () => {
    writeFileSync(CONFIG_FILE, JSON.stringify({ sync: { creator: "pk1" } }));

    const config = loadSyncConfig({ STRATA_SUPABASE_URL: "not a url" });

    expect(config.creator).toBe("pk1");
    expect(config.supabaseUrl).toBeUndefined();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("falls back to defaults for an invalid section", () => {
    writeFileSync(CONFIG_FILE, JSON.stringify({ sync: { collectTimeoutMs: -1 } }));

    expect(loadSyncConfig({})).toEqual(DEFAULT_SYNC_CONFIG);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("falls back to defaults for unreadable JSON", () => {
    writeFileSync(CONFIG_FILE, "{ not json");

    expect(loadSyncConfig({})).toEqual(DEFAULT_SYNC_CONFIG);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("saves the sync section and keeps other settings", () => {
    writeFileSync(CONFIG_FILE, JSON.stringify({ telemetry: { enabled: false } }));

    saveSyncConfig({ creator: "pk1", recordsTable: "sync_records" });

    const saved = JSON.parse(readFileSync(CONFIG_FILE, "utf-8"));
    expect(saved.telemetry).toEqual({ enabled: false });
    expect(saved.sync.creator).toBe("pk1");
    expect(saved.sync.recordsTable).toBe("sync_records");
    expect(loadSyncConfig({}).creator).toBe("pk1");
  });

  it("creates the directory and writes an owner-only file", () => {
    const nested = join(TEST_DIR, "nested");
    setConfigDir(nested);

    saveSyncConfig({ creator: "pk1" });

    expect(statSync(join(nested, "config.json")).mode & 0o777).toBe(0o600);
  });
});
