/**
 * Memory Transport
 *
 * In-process relay implementing the Transport contract. Keeps a network
 * history (non-ephemeral records), a local RecordCache of what it has
 * delivered, and fans live records out to matching subscriptions.
 *
 * Used for local runs and as the stand-in transport in tests, so it also
 * lets callers simulate outages and mid-stream failures.
 */

import type { SyncRecord } from "../records/record.js";
import { isEphemeralKind } from "../records/kinds.js";
import { AsyncQueue } from "./async-queue.js";
import { TransportUnavailableError } from "./errors.js";
import { applyLimit, matchesFilter } from "./filter.js";
import { RecordCache } from "./record-cache.js";
import type {
  CollectOptions,
  RecordFilter,
  RecordStream,
  SubscribeOptions,
  Transport,
} from "./types.js";

interface LiveSubscription {
  filter: RecordFilter;
  queue: AsyncQueue<SyncRecord>;
}

export interface MemoryTransportOptions {
  /** Destination name reported by publish */
  name?: string;
  cache?: RecordCache;
}

export class MemoryTransport implements Transport {
  readonly name: string;
  readonly cache: RecordCache;
  readonly published: SyncRecord[] = [];

  private history = new Map<string, SyncRecord>();
  private live = new Set<LiveSubscription>();
  private outage: Error | null = null;
  private publishFailures: Error[] = [];

  constructor(options: MemoryTransportOptions = {}) {
    this.name = options.name ?? "memory";
    this.cache = options.cache ?? new RecordCache();
  }

  // --- Transport ---

  subscribe(filter: RecordFilter, options: SubscribeOptions): RecordStream {
    this.assertAvailable("subscribe");

    const queue: AsyncQueue<SyncRecord> = new AsyncQueue(() => {
      this.live.delete(subscription);
    });
    const subscription: LiveSubscription = { filter, queue };

    for (const record of this.initialRecords(filter, options.cachePolicy)) {
      queue.push(record);
    }

    if (options.cachePolicy !== "cacheOnly") {
      this.live.add(subscription);
    }

    return {
      [Symbol.asyncIterator]: () => queue[Symbol.asyncIterator](),
      close: () => queue.close(),
    };
  }

  async collectOnce(filter: RecordFilter, options: CollectOptions): Promise<SyncRecord[]> {
    this.assertAvailable("collectOnce");
    return applyLimit(this.initialRecords(filter, options.cachePolicy), filter);
  }

  async publish(record: SyncRecord): Promise<Set<string>> {
    this.assertAvailable("publish");

    const failure = this.publishFailures.shift();
    if (failure) {
      throw new TransportUnavailableError(`publish failed: ${failure.message}`, failure);
    }

    this.published.push(record);
    this.deliver(record);
    return new Set([this.name]);
  }

  // --- Network simulation ---

  /**
   * A record arriving from the network. Repeated calls deliver duplicates.
   */
  deliver(record: SyncRecord): void {
    if (!isEphemeralKind(record.kind)) {
      this.history.set(record.id, record);
    }
    this.cache.put(record);

    for (const subscription of Array.from(this.live)) {
      if (matchesFilter(record, subscription.filter)) {
        subscription.queue.push(record);
      }
    }
  }

  /**
   * Seed records into the local cache only, as if persisted by an earlier run.
   */
  seedCache(records: SyncRecord[]): void {
    for (const record of records) this.cache.put(record);
  }

  /**
   * Make every operation fail until `restore()` is called.
   */
  setOutage(error: Error): void {
    this.outage = error;
  }

  restore(): void {
    this.outage = null;
  }

  /**
   * Fail the next publish calls with the given errors, in order.
   */
  failNextPublish(...errors: Error[]): void {
    this.publishFailures.push(...errors);
  }

  /**
   * Break every open stream whose filter matches `predicate`.
   */
  failStreams(error: Error, predicate: (filter: RecordFilter) => boolean = () => true): void {
    for (const subscription of Array.from(this.live)) {
      if (predicate(subscription.filter)) {
        subscription.queue.fail(error);
      }
    }
  }

  get liveSubscriptionCount(): number {
    return this.live.size;
  }

  // --- Internals ---

  private initialRecords(
    filter: RecordFilter,
    cachePolicy: SubscribeOptions["cachePolicy"]
  ): SyncRecord[] {
    const seen = new Set<string>();
    const records: SyncRecord[] = [];

    const add = (record: SyncRecord) => {
      if (seen.has(record.id)) return;
      seen.add(record.id);
      records.push(record);
    };

    if (cachePolicy !== "networkOnly") {
      this.cache.query(filter).forEach(add);
    }

    if (cachePolicy !== "cacheOnly") {
      const fromNetwork = applyLimit(
        Array.from(this.history.values()).filter((r) => matchesFilter(r, filter)),
        filter
      );
      for (const record of fromNetwork) {
        add(record);
        this.cache.put(record);
      }
    }

    return records.sort((a, b) => a.createdAt - b.createdAt);
  }

  private assertAvailable(operation: string): void {
    if (this.outage) {
      throw new TransportUnavailableError(
        `${operation} failed: ${this.outage.message}`,
        this.outage
      );
    }
  }
}
