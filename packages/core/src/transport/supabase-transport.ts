/**
 * Supabase Transport
 *
 * Records live in a Postgres table; live delivery uses Realtime
 * `postgres_changes` INSERT events, one-shot reads use a select, and
 * publishing is an insert. A local RecordCache serves the cache policies.
 *
 * Table shape:
 *   id text primary key, creator text, kind int, created_at bigint,
 *   content text, tags jsonb
 */

import type { RealtimeChannel, SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { SyncRecord } from "../records/record.js";
import { AsyncQueue } from "./async-queue.js";
import { TransportUnavailableError, toTransportError } from "./errors.js";
import { applyLimit, filterSignature, matchesFilter } from "./filter.js";
import { RecordCache } from "./record-cache.js";
import type {
  CollectOptions,
  RecordFilter,
  RecordStream,
  SubscribeOptions,
  Transport,
} from "./types.js";

const DEFAULT_HISTORY_LIMIT = 500;

// --- Rows ---

export const RecordRowSchema = z.object({
  id: z.string().min(1),
  creator: z.string().min(1),
  kind: z.number().int(),
  created_at: z.number().int(),
  content: z.string(),
  tags: z.array(z.array(z.string())),
});

export type RecordRow = z.infer<typeof RecordRowSchema>;

export function recordToRow(record: SyncRecord): RecordRow {
  return {
    id: record.id,
    creator: record.creator,
    kind: record.kind,
    created_at: record.createdAt,
    content: record.content,
    tags: record.tags,
  };
}

/**
 * Convert an untrusted row. Invalid rows are dropped with a warning.
 */
export function rowToRecord(row: unknown): SyncRecord | null {
  const parsed = RecordRowSchema.safeParse(row);
  if (!parsed.success) {
    console.warn("[SupabaseTransport] Dropping malformed row:", parsed.error.message);
    return null;
  }

  const { created_at, ...rest } = parsed.data;
  return { ...rest, createdAt: created_at };
}

/**
 * Every choice of one accepted value per tag key. A key with no accepted
 * values matches nothing, so it yields no combinations.
 */
export function tagCombinations(filter: RecordFilter): string[][][] {
  let combinations: string[][][] = [[]];
  if (!filter.tags) return combinations;

  for (const key of Object.keys(filter.tags).sort()) {
    const values = Array.from(new Set(filter.tags[key]));
    combinations = combinations.flatMap((tags) => values.map((value) => [...tags, [key, value]]));
  }
  return combinations;
}

// --- Transport ---

export interface SupabaseTransportOptions {
  client: SupabaseClient;
  table?: string;
  schema?: string;
  cache?: RecordCache;
}

let channelCounter = 0;

export class SupabaseTransport implements Transport {
  readonly cache: RecordCache;
  private readonly client: SupabaseClient;
  private readonly table: string;
  private readonly schema: string;

  constructor(options: SupabaseTransportOptions) {
    this.client = options.client;
    this.table = options.table ?? "records";
    this.schema = options.schema ?? "public";
    this.cache = options.cache ?? new RecordCache();
  }

  subscribe(filter: RecordFilter, options: SubscribeOptions): RecordStream {
    let channel: RealtimeChannel | null = null;

    const queue = new AsyncQueue<SyncRecord>(() => {
      if (!channel) return;
      const closing = channel;
      channel = null;
      this.client.removeChannel(closing).catch((err: unknown) => {
        console.error("[SupabaseTransport] Failed to remove channel:", err);
      });
    });

    for (const record of options.cachePolicy === "networkOnly" ? [] : this.cache.query(filter)) {
      queue.push(record);
    }

    if (options.cachePolicy === "cacheOnly") {
      return this.toStream(queue);
    }

    try {
      channel = this.openChannel(filter, queue);
    } catch (err) {
      queue.close();
      throw toTransportError(err, "subscribe");
    }

    this.fetchRecords(filter)
      .then((records) => {
        for (const record of records) {
          this.cache.put(record);
          queue.push(record);
        }
      })
      .catch((err: unknown) => {
        queue.fail(toTransportError(err, "subscribe history"));
      });

    return this.toStream(queue);
  }

  async collectOnce(filter: RecordFilter, options: CollectOptions): Promise<SyncRecord[]> {
    const cached = options.cachePolicy === "networkOnly" ? [] : this.cache.query(filter);
    if (options.cachePolicy === "cacheOnly") {
      return cached;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new TransportUnavailableError(`collectOnce timed out after ${options.timeoutMs}ms`));
      }, options.timeoutMs);
    });

    try {
      const fetched = await Promise.race([this.fetchRecords(filter), timeout]);
      for (const record of fetched) this.cache.put(record);

      const byId = new Map<string, SyncRecord>();
      for (const record of [...cached, ...fetched]) byId.set(record.id, record);
      return applyLimit(Array.from(byId.values()), filter);
    } catch (err) {
      throw toTransportError(err, "collectOnce");
    } finally {
      clearTimeout(timer);
    }
  }

  async publish(record: SyncRecord): Promise<Set<string>> {
    const { error } = await this.client.from(this.table).insert(recordToRow(record));

    if (error) {
      throw new TransportUnavailableError(`publish failed: ${error.message}`, error);
    }

    this.cache.put(record);
    return new Set([`supabase:${this.table}`]);
  }

  // --- Internals ---

  private openChannel(filter: RecordFilter, queue: AsyncQueue<SyncRecord>): RealtimeChannel {
    channelCounter += 1;
    const name = `records-${channelCounter}`;
    const serverFilter =
      filter.kinds && filter.kinds.length > 0
        ? `kind=in.(${filter.kinds.join(",")})`
        : undefined;

    return this.client
      .channel(name)
      .on(
        "postgres_changes",
        {
          event: "INSERT",
          schema: this.schema,
          table: this.table,
          filter: serverFilter,
        },
        (payload) => {
          const record = rowToRecord(payload.new);
          if (record && matchesFilter(record, filter)) {
            this.cache.put(record);
            queue.push(record);
          }
        }
      )
      .subscribe((status, err) => {
        const state: string = status;
        if (state === "CHANNEL_ERROR" || state === "TIMED_OUT") {
          queue.fail(
            new TransportUnavailableError(
              `Realtime channel ${state} for ${filterSignature(filter)}`,
              err
            )
          );
        }
      });
  }

  /**
   * History select. Tag constraints become jsonb containment, one select per
   * combination of accepted values, so the row limit applies after them.
   */
  private async fetchRecords(filter: RecordFilter): Promise<SyncRecord[]> {
    const limit = filter.limit ?? DEFAULT_HISTORY_LIMIT;
    const batches = await Promise.all(
      tagCombinations(filter).map((tags) => this.selectRecords(filter, tags, limit))
    );

    const byId = new Map<string, SyncRecord>();
    for (const batch of batches) {
      for (const record of batch) byId.set(record.id, record);
    }
    return applyLimit(Array.from(byId.values()), { ...filter, limit });
  }

  private async selectRecords(
    filter: RecordFilter,
    tags: string[][],
    limit: number
  ): Promise<SyncRecord[]> {
    let query = this.client.from(this.table).select("*");

    if (filter.kinds) query = query.in("kind", filter.kinds);
    if (filter.authors) query = query.in("creator", filter.authors);
    if (filter.since !== undefined) query = query.gte("created_at", filter.since);
    if (tags.length > 0) query = query.contains("tags", JSON.stringify(tags));

    const { data, error } = await query.order("created_at", { ascending: false }).limit(limit);

    if (error) {
      throw new TransportUnavailableError(`select failed: ${error.message}`, error);
    }

    const rows: unknown[] = Array.isArray(data) ? data : [];
    const records: SyncRecord[] = [];
    for (const row of rows) {
      const record = rowToRecord(row);
      // Containment also accepts longer tags and other positions
      if (record && matchesFilter(record, filter)) records.push(record);
    }
    return records;
  }

  private toStream(queue: AsyncQueue<SyncRecord>): RecordStream {
    return {
      [Symbol.asyncIterator]: () => queue[Symbol.asyncIterator](),
      close: () => queue.close(),
    };
  }
}
