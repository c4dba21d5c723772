/**
 * Supabase Transport tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { SyncRecord } from "../records/record.js";
import { computeRecordId } from "../records/record.js";
import { TransportUnavailableError } from "./errors.js";
import { createIdentitySigner } from "./signer.js";
import {
  SupabaseTransport,
  recordToRow,
  rowToRecord,
  tagCombinations,
} from "./supabase-transport.js";

type InsertHandler = (payload: { new: unknown }) => void;
type StatusHandler = (status: string, err?: Error) => void;

function row(id: string, overrides: Record<string, unknown> = {}) {
  return {
    id,
    creator: "pk1",
    kind: 11,
    created_at: 100,
    content: "hello",
    tags: [["a", "31933:pk1:proj1"]],
    ...overrides,
  };
}

function createMockQuery(rows: unknown[], error: { message: string } | null = null) {
  return {
    select: vi.fn().mockReturnThis(),
    in: vi.fn().mockReturnThis(),
    gte: vi.fn().mockReturnThis(),
    contains: vi.fn().mockReturnThis(),
    order: vi.fn().mockReturnThis(),
    limit: vi.fn().mockResolvedValue({ data: error ? null : rows, error }),
    insert: vi.fn().mockResolvedValue({ error: null }),
  };
}

function createMockChannel() {
  const channel = {
    inserted: undefined as InsertHandler | undefined,
    statusChanged: undefined as StatusHandler | undefined,
    on: vi.fn(),
    subscribe: vi.fn(),
  };
  channel.on.mockImplementation((_event: string, _config: unknown, handler: InsertHandler) => {
    channel.inserted = handler;
    return channel;
  });
  channel.subscribe.mockImplementation((handler: StatusHandler) => {
    channel.statusChanged = handler;
    return channel;
  });
  return channel;
}

function createMockClient(query = createMockQuery([])) {
  const mockChannel = createMockChannel();
  return {
    query,
    mockChannel,
    client: {
      from: vi.fn().mockReturnValue(query),
      channel: vi.fn().mockReturnValue(mockChannel),
      removeChannel: vi.fn().mockResolvedValue("ok"),
    },
  };
}

const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe("rows", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("maps between rows and records", () => {
    const record = rowToRecord(row("r1"));

    expect(record).toEqual({
      id: "r1",
      creator: "pk1",
      kind: 11,
      createdAt: 100,
      content: "hello",
      tags: [["a", "31933:pk1:proj1"]],
    });
    expect(record && recordToRow(record)).toEqual(row("r1"));
  });

  it("drops malformed rows with a warning", () => {
    expect(rowToRecord(row("r1", { kind: "11" }))).toBeNull();
    expect(rowToRecord(null)).toBeNull();
    expect(console.warn).toHaveBeenCalledTimes(2);
  });
});

describe("tagCombinations", () => {
  it("picks one value per key", () => {
    expect(tagCombinations({})).toEqual([[]]);
    expect(tagCombinations({ tags: { e: ["t1", "t2", "t1"], a: ["p1"] } })).toEqual([
      [["a", "p1"], ["e", "t1"]],
      [["a", "p1"], ["e", "t2"]],
    ]);
    expect(tagCombinations({ tags: { a: ["p1"], e: [] } })).toEqual([]);
  });
});

describe("SupabaseTransport.subscribe", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("listens for inserts on the records table", () => {
    const { client, mockChannel } = createMockClient();
    const transport = new SupabaseTransport({ client: client as any });

    transport.subscribe({ kinds: [11, 1111] }, { cachePolicy: "networkOnly" });

    expect(client.channel).toHaveBeenCalledWith(expect.stringMatching(/^records-\d+$/));
    expect(mockChannel.on).toHaveBeenCalledWith(
      "postgres_changes",
      { event: "INSERT", schema: "public", table: "records", filter: "kind=in.(11,1111)" },
      expect.any(Function)
    );
  });

  it("streams history then matching inserts", async () => {
    const query = createMockQuery([row("old", { created_at: 50 })]);
    const { client, mockChannel } = createMockClient(query);
    const transport = new SupabaseTransport({ client: client as any, table: "sync_records" });

    const stream = transport.subscribe(
      { kinds: [11], tags: { a: ["31933:pk1:proj1"] } },
      { cachePolicy: "networkOnly" }
    );
    const iterator = stream[Symbol.asyncIterator]();

    const first = await iterator.next();
    expect(first.done ? null : first.value.id).toBe("old");
    expect(client.from).toHaveBeenCalledWith("sync_records");
    expect(query.in).toHaveBeenCalledWith("kind", [11]);
    expect(query.contains).toHaveBeenCalledWith("tags", '[["a","31933:pk1:proj1"]]');

    mockChannel.inserted?.({ new: row("other-project", { tags: [["a", "31933:pk1:proj2"]] }) });
    mockChannel.inserted?.({ new: row("bad", { tags: "nope" }) });
    mockChannel.inserted?.({ new: row("live", { created_at: 200 }) });

    const second = await iterator.next();
    expect(second.done ? null : second.value.id).toBe("live");
    expect(transport.cache.has("live")).toBe(true);
    expect(transport.cache.has("other-project")).toBe(false);
  });

  it("fails the stream when the channel errors", async () => {
    const { client, mockChannel } = createMockClient();
    const transport = new SupabaseTransport({ client: client as any });
    const stream = transport.subscribe({ kinds: [11] }, { cachePolicy: "networkOnly" });
    await flush();

    mockChannel.statusChanged?.("CHANNEL_ERROR", new Error("socket closed"));

    await expect(stream[Symbol.asyncIterator]().next()).rejects.toBeInstanceOf(
      TransportUnavailableError
    );
    expect(client.removeChannel).toHaveBeenCalledWith(mockChannel);
  });

  it("ignores healthy status changes", async () => {
    const { client, mockChannel } = createMockClient();
    const transport = new SupabaseTransport({ client: client as any });
    const stream = transport.subscribe({ kinds: [11] }, { cachePolicy: "networkOnly" });
    await flush();

    mockChannel.statusChanged?.("SUBSCRIBED");
    mockChannel.inserted?.({ new: row("live") });

    const next = await stream[Symbol.asyncIterator]().next();
    expect(next.done ? null : next.value.id).toBe("live");
  });

  it("fails the stream when the history select fails", async () => {
    const { client } = createMockClient(createMockQuery([], { message: "permission denied" }));
    const transport = new SupabaseTransport({ client: client as any });
    const stream = transport.subscribe({ kinds: [11] }, { cachePolicy: "networkOnly" });

    await expect(stream[Symbol.asyncIterator]().next()).rejects.toThrow(
      "select failed: permission denied"
    );
  });

  it("removes the channel on close", () => {
    const { client, mockChannel } = createMockClient();
    const transport = new SupabaseTransport({ client: client as any });
    const stream = transport.subscribe({ kinds: [11] }, { cachePolicy: "networkOnly" });

    stream.close();
    stream.close();

    expect(client.removeChannel).toHaveBeenCalledTimes(1);
    expect(client.removeChannel).toHaveBeenCalledWith(mockChannel);
  });

  it("opens no channel under cacheOnly", () => {
    const { client } = createMockClient();
    const transport = new SupabaseTransport({ client: client as any });

    transport.subscribe({ kinds: [11] }, { cachePolicy: "cacheOnly" });

    expect(client.channel).not.toHaveBeenCalled();
    expect(client.from).not.toHaveBeenCalled();
  });
});

describe("SupabaseTransport.collectOnce", () => {
  it("builds the select from the filter", async () => {
    const query = createMockQuery([row("a", { created_at: 100 }), row("b", { created_at: 300 })]);
    const { client } = createMockClient(query);
    const transport = new SupabaseTransport({ client: client as any });

    const records = await transport.collectOnce(
      { kinds: [11], authors: ["pk1"], since: 50, limit: 10 },
      { cachePolicy: "networkOnly", timeoutMs: 1000 }
    );

    expect(records.map((r) => r.id)).toEqual(["b", "a"]);
    expect(query.select).toHaveBeenCalledWith("*");
    expect(query.in).toHaveBeenCalledWith("kind", [11]);
    expect(query.in).toHaveBeenCalledWith("creator", ["pk1"]);
    expect(query.gte).toHaveBeenCalledWith("created_at", 50);
    expect(query.order).toHaveBeenCalledWith("created_at", { ascending: false });
    expect(query.limit).toHaveBeenCalledWith(10);
  });

  it("limits rows after the tag constraint", async () => {
    type Row = ReturnType<typeof row>;
    const rows: Row[] = [row("alpha-old", { created_at: 10, tags: [["a", "31933:pk1:alpha"]] })];
    for (let i = 0; i < 500; i++) {
      rows.push(row(`beta-${i}`, { created_at: 1000 + i, tags: [["a", "31933:pk1:beta"]] }));
    }

    // Evaluates containment, ordering and the limit the way the database would
    let containing: string[][] = [];
    const query = createMockQuery([]);
    query.contains.mockImplementation((_column: string, value: string) => {
      containing = JSON.parse(value);
      return query;
    });
    query.limit.mockImplementation(async (count: number) => {
      const wanted = containing;
      containing = [];
      const data = rows
        .filter((r) => wanted.every(([k, v]) => r.tags.some((t) => t[0] === k && t[1] === v)))
        .sort((a, b) => b.created_at - a.created_at)
        .slice(0, count);
      return { data, error: null };
    });
    const { client } = createMockClient(query);
    const transport = new SupabaseTransport({ client: client as any });

    const records = await transport.collectOnce(
      { kinds: [11], tags: { a: ["31933:pk1:alpha"] } },
      { cachePolicy: "networkOnly", timeoutMs: 1000 }
    );

    expect(records.map((r) => r.id)).toEqual(["alpha-old"]);
    expect(query.limit).toHaveBeenCalledWith(500);
  });

  it("selects once per accepted tag value", async () => {
    const query = createMockQuery([]);
    const t1 = row("t1-abort", { kind: 24133, created_at: 100, tags: [["e", "t1"]] });
    const t2 = row("t2-abort", { kind: 24133, created_at: 200, tags: [["e", "t2"]] });
    query.limit
      .mockResolvedValueOnce({ data: [t1], error: null })
      .mockResolvedValueOnce({ data: [t2], error: null });
    const { client } = createMockClient(query);
    const transport = new SupabaseTransport({ client: client as any });

    const records = await transport.collectOnce(
      { kinds: [24133], tags: { e: ["t1", "t2"] } },
      { cachePolicy: "networkOnly", timeoutMs: 1000 }
    );

    expect(query.contains).toHaveBeenNthCalledWith(1, "tags", '[["e","t1"]]');
    expect(query.contains).toHaveBeenNthCalledWith(2, "tags", '[["e","t2"]]');
    expect(records.map((r) => r.id)).toEqual(["t2-abort", "t1-abort"]);
  });

  it("skips the select when a tag accepts no values", async () => {
    const { client } = createMockClient();
    const transport = new SupabaseTransport({ client: client as any });

    await expect(
      transport.collectOnce({ tags: { e: [] } }, { cachePolicy: "networkOnly", timeoutMs: 1000 })
    ).resolves.toEqual([]);
    expect(client.from).not.toHaveBeenCalled();
  });

  it("merges the cache with fetched rows", async () => {
    const query = createMockQuery([row("fetched", { created_at: 200 })]);
    const { client } = createMockClient(query);
    const transport = new SupabaseTransport({ client: client as any });
    const cached: SyncRecord = {
      id: "cached",
      creator: "pk1",
      kind: 11,
      createdAt: 100,
      content: "",
      tags: [],
    };
    transport.cache.put(cached);

    const records = await transport.collectOnce({}, { cachePolicy: "cacheThenNetwork", timeoutMs: 1000 });

    expect(records.map((r) => r.id)).toEqual(["fetched", "cached"]);
    expect(query.limit).toHaveBeenCalledWith(500);
  });

  it("answers cacheOnly without querying", async () => {
    const { client } = createMockClient();
    const transport = new SupabaseTransport({ client: client as any });

    await expect(transport.collectOnce({}, { cachePolicy: "cacheOnly", timeoutMs: 1000 })).resolves.toEqual([]);
    expect(client.from).not.toHaveBeenCalled();
  });

  it("wraps select errors", async () => {
    const { client } = createMockClient(createMockQuery([], { message: "boom" }));
    const transport = new SupabaseTransport({ client: client as any });

    await expect(
      transport.collectOnce({}, { cachePolicy: "networkOnly", timeoutMs: 1000 })
    ).rejects.toThrow("select failed: boom");
  });

  it("times out a slow select", async () => {
    const query = createMockQuery([]);
    query.limit.mockReturnValue(new Promise(() => {}));
    const { client } = createMockClient(query);
    const transport = new SupabaseTransport({ client: client as any });

    await expect(
      transport.collectOnce({}, { cachePolicy: "networkOnly", timeoutMs: 5 })
    ).rejects.toThrow("collectOnce timed out after 5ms");
  });
});

describe("SupabaseTransport.publish", () => {
  const signer = createIdentitySigner("pk1");

  it("inserts the record row", async () => {
    const { client, query } = createMockClient();
    const transport = new SupabaseTransport({ client: client as any });
    const record = await signer.sign({ kind: 11, createdAt: 100, content: "hi", tags: [] });

    const destinations = await transport.publish(record);

    expect(record.id).toBe(computeRecordId("pk1", { kind: 11, createdAt: 100, content: "hi", tags: [] }));
    expect(query.insert).toHaveBeenCalledWith(recordToRow(record));
    expect(destinations).toEqual(new Set(["supabase:records"]));
    expect(transport.cache.has(record.id)).toBe(true);
  });

  it("throws TransportUnavailableError when the insert fails", async () => {
    const { client, query } = createMockClient();
    query.insert.mockResolvedValue({ error: { message: "duplicate key" } });
    const transport = new SupabaseTransport({ client: client as any });
    const record = await signer.sign({ kind: 11, createdAt: 100, content: "hi", tags: [] });

    await expect(transport.publish(record)).rejects.toThrow("publish failed: duplicate key");
    expect(transport.cache.has(record.id)).toBe(false);
  });
});
