/**
 * Subscription Orchestrator
 *
 * Opens transport subscriptions on behalf of consumers and fans records out
 * to their handlers.
 *
 * - One transport subscription per filter signature, shared by every
 *   consumer with the same interest; late joiners get a replay of what the
 *   subscription has already seen
 * - Each shared subscription is drained by its own task; a failure ends
 *   that task only and leaves it available for retry
 * - `watchEach` keeps one child watch per entity of a parent store
 *
 * Usage:
 *   const orchestrator = new SubscriptionOrchestrator({ transport });
 *   const handle = orchestrator.watch({ kinds: [31933] }, (record) => ...);
 *   handle.cancel();
 */

import type { SyncRecord } from "../records/record.js";
import type { EntityStore } from "../store/entity-store.js";
import {
  TransportNotConfiguredError,
  toTransportError,
  type SyncError,
} from "../transport/errors.js";
import { filterSignature } from "../transport/filter.js";
import type {
  CachePolicy,
  RecordFilter,
  RecordStream,
  Transport,
} from "../transport/types.js";

// --- Types ---

export type WatchStatus = "active" | "inactive" | "cancelled";

export type RecordHandler = (record: SyncRecord) => void;

export interface WatchOptions {
  cachePolicy?: CachePolicy;
  /** Called when the underlying subscription fails mid-stream */
  onError?: (error: SyncError) => void;
}

export interface WatchHandle {
  readonly signature: string;
  status: () => WatchStatus;
  error: () => SyncError | null;
  /** Stop delivery and release the subscription. Safe to call repeatedly. */
  cancel: () => void;
  /** Reopen a failed subscription. No-op while active or after cancel. */
  retry: () => void;
}

export interface ChildWatchSpec<P> {
  parents: EntityStore<P>;
  childFilter: (parent: P, identity: string) => RecordFilter;
  onChildRecord: (parent: P, record: SyncRecord) => void;
  /**
   * Identifies what a child watch was started for. A parent update with a
   * different fingerprint restarts its child. Defaults to the child filter's
   * signature.
   */
  fingerprint?: (parent: P, identity: string) => string;
  cachePolicy?: CachePolicy;
  onError?: (identity: string, error: SyncError) => void;
}

export interface ChildWatchGroup {
  /** Parent identities with a running child watch */
  children: () => string[];
  child: (identity: string) => WatchHandle | undefined;
  cancel: () => void;
}

export interface SubscriptionInfo {
  signature: string;
  consumers: number;
  status: "active" | "inactive";
}

export interface OrchestratorOptions {
  transport: Transport | null;
  defaultCachePolicy?: CachePolicy;
  /** Records remembered per subscription for replay to late consumers */
  replayBufferSize?: number;
  onSubscriptionError?: (signature: string, error: SyncError) => void;
  debug?: boolean;
}

const DEFAULT_REPLAY_BUFFER = 500;

// --- Consumers ---

class Consumer implements WatchHandle {
  private cancelled = false;

  constructor(
    private readonly shared: SharedSubscription,
    private readonly handler: RecordHandler,
    readonly onError: ((error: SyncError) => void) | undefined
  ) {}

  get signature(): string {
    return this.shared.signature;
  }

  deliver(record: SyncRecord): void {
    if (this.cancelled) return;
    try {
      this.handler(record);
    } catch (err) {
      console.error(`[Orchestrator] Handler failed for ${this.signature}:`, err);
    }
  }

  status(): WatchStatus {
    if (this.cancelled) return "cancelled";
    return this.shared.state === "active" ? "active" : "inactive";
  }

  error(): SyncError | null {
    return this.cancelled ? null : this.shared.error;
  }

  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.shared.remove(this);
  }

  retry(): void {
    if (this.cancelled) return;
    this.shared.reopen();
  }
}

// --- Shared subscriptions ---

class SharedSubscription {
  state: "active" | "inactive" | "closed" = "inactive";
  error: SyncError | null = null;

  private consumers = new Set<Consumer>();
  private replay = new Map<string, SyncRecord>();
  private stream: RecordStream | null = null;

  constructor(
    readonly signature: string,
    private readonly filter: RecordFilter,
    private readonly cachePolicy: CachePolicy,
    private readonly transport: Transport,
    private readonly replayLimit: number,
    private readonly onRelease: (shared: SharedSubscription) => void,
    private readonly onFailure: (shared: SharedSubscription, error: SyncError) => void
  ) {}

  get consumerCount(): number {
    return this.consumers.size;
  }

  /**
   * Open the transport stream and start draining it.
   * Throws TransportUnavailableError when the transport refuses.
   */
  open(): void {
    let stream: RecordStream;
    try {
      stream = this.transport.subscribe(this.filter, { cachePolicy: this.cachePolicy });
    } catch (err) {
      const error = toTransportError(err, "subscribe");
      this.state = "inactive";
      this.error = error;
      throw error;
    }

    this.stream = stream;
    this.state = "active";
    this.error = null;
    void this.drain(stream);
  }

  reopen(): void {
    if (this.state !== "inactive") return;
    this.open();
  }

  add(consumer: Consumer): void {
    this.consumers.add(consumer);
    for (const record of Array.from(this.replay.values())) {
      consumer.deliver(record);
    }
  }

  remove(consumer: Consumer): void {
    this.consumers.delete(consumer);
    if (this.consumers.size === 0) {
      this.close();
    }
  }

  close(): void {
    if (this.state === "closed") return;
    this.state = "closed";
    this.consumers.clear();
    this.replay.clear();

    const stream = this.stream;
    this.stream = null;
    stream?.close();
    this.onRelease(this);
  }

  private async drain(stream: RecordStream): Promise<void> {
    try {
      for await (const record of stream) {
        if (this.stream !== stream) break;
        this.dispatch(record);
      }
    } catch (err) {
      if (this.stream !== stream) return;
      this.stream = null;
      this.state = "inactive";
      this.error = toTransportError(err, "stream");
      this.onFailure(this, this.error);

      for (const consumer of Array.from(this.consumers)) {
        consumer.onError?.(this.error);
      }
    }
  }

  private dispatch(record: SyncRecord): void {
    this.replay.delete(record.id);
    this.replay.set(record.id, record);
    while (this.replay.size > this.replayLimit) {
      const oldest = this.replay.keys().next();
      if (oldest.done) break;
      this.replay.delete(oldest.value);
    }

    for (const consumer of Array.from(this.consumers)) {
      consumer.deliver(record);
    }
  }
}

// --- Orchestrator ---

export class SubscriptionOrchestrator {
  private readonly transport: Transport | null;
  private readonly defaultCachePolicy: CachePolicy;
  private readonly replayBufferSize: number;
  private readonly onSubscriptionError?: (signature: string, error: SyncError) => void;
  private readonly debug: boolean;

  private registry = new Map<string, SharedSubscription>();
  private groups = new Set<ChildWatchGroup>();

  constructor(options: OrchestratorOptions) {
    this.transport = options.transport;
    this.defaultCachePolicy = options.defaultCachePolicy ?? "cacheThenNetwork";
    this.replayBufferSize = options.replayBufferSize ?? DEFAULT_REPLAY_BUFFER;
    this.onSubscriptionError = options.onSubscriptionError;
    this.debug = options.debug ?? false;
  }

  /**
   * Deliver every record matching `filter` to `handler` until cancelled.
   *
   * @throws TransportNotConfiguredError when no transport is bound
   * @throws TransportUnavailableError when the transport refuses the subscription
   */
  watch(filter: RecordFilter, handler: RecordHandler, options: WatchOptions = {}): WatchHandle {
    const transport = this.transport;
    if (!transport) {
      throw new TransportNotConfiguredError("Cannot watch records: no transport configured");
    }

    const cachePolicy = options.cachePolicy ?? this.defaultCachePolicy;
    const signature = filterSignature(filter, cachePolicy);

    let shared = this.registry.get(signature);
    if (!shared) {
      const created = new SharedSubscription(
        signature,
        filter,
        cachePolicy,
        transport,
        this.replayBufferSize,
        (released) => this.release(released),
        (failed, error) => this.handleFailure(failed, error)
      );
      created.open();
      this.registry.set(signature, created);
      this.log(`Opened ${signature}`);
      shared = created;
    } else {
      shared.reopen();
    }

    const consumer = new Consumer(shared, handler, options.onError);
    shared.add(consumer);
    return consumer;
  }

  /**
   * Keep one child watch per entity in `spec.parents`, started as soon as
   * the parent appears and cancelled when it is removed. Starting is
   * idempotent per fingerprint. Cancelling the returned group cancels every
   * child.
   */
  watchEach<P>(spec: ChildWatchSpec<P>): ChildWatchGroup {
    const children = new Map<string, { fingerprint: string; handle: WatchHandle }>();
    let cancelled = false;

    const fingerprintOf = (parent: P, identity: string): string =>
      spec.fingerprint
        ? spec.fingerprint(parent, identity)
        : filterSignature(
            spec.childFilter(parent, identity),
            spec.cachePolicy ?? this.defaultCachePolicy
          );

    const start = (identity: string, parent: P) => {
      const fingerprint = fingerprintOf(parent, identity);
      const existing = children.get(identity);
      if (existing) {
        if (existing.fingerprint === fingerprint) {
          if (existing.handle.status() === "inactive") this.retryQuietly(existing.handle);
          return;
        }
        stop(identity);
      }

      try {
        const handle = this.watch(
          spec.childFilter(parent, identity),
          (record) => {
            const current = spec.parents.get(identity);
            if (current !== undefined) spec.onChildRecord(current, record);
          },
          {
            cachePolicy: spec.cachePolicy,
            onError: (error) => spec.onError?.(identity, error),
          }
        );
        children.set(identity, { fingerprint, handle });
      } catch (err) {
        const error = toTransportError(err, "child watch");
        console.error(`[Orchestrator] Could not start child watch for ${identity}:`, error.message);
        spec.onError?.(identity, error);
      }
    };

    function stop(identity: string): void {
      const child = children.get(identity);
      if (!child) return;
      child.handle.cancel();
      children.delete(identity);
    }

    const unsubscribe = spec.parents.onChange((change) => {
      if (cancelled) return;
      if (change.type === "remove") {
        stop(change.identity);
      } else {
        start(change.identity, change.entity);
      }
    });

    for (const [identity, parent] of spec.parents.snapshot()) {
      start(identity, parent);
    }

    const group: ChildWatchGroup = {
      children: () => Array.from(children.keys()),
      child: (identity) => children.get(identity)?.handle,
      cancel: () => {
        if (cancelled) return;
        cancelled = true;
        unsubscribe();
        for (const identity of Array.from(children.keys())) stop(identity);
        this.groups.delete(group);
      },
    };

    this.groups.add(group);
    return group;
  }

  /**
   * One-shot read through the bound transport.
   */
  async collectOnce(
    filter: RecordFilter,
    options: { timeoutMs: number; cachePolicy?: CachePolicy }
  ): Promise<SyncRecord[]> {
    if (!this.transport) {
      throw new TransportNotConfiguredError("Cannot collect records: no transport configured");
    }

    try {
      return await this.transport.collectOnce(filter, {
        timeoutMs: options.timeoutMs,
        cachePolicy: options.cachePolicy ?? this.defaultCachePolicy,
      });
    } catch (err) {
      throw toTransportError(err, "collectOnce");
    }
  }

  activeSubscriptions(): SubscriptionInfo[] {
    const result: SubscriptionInfo[] = [];
    for (const shared of this.registry.values()) {
      if (shared.state === "closed") continue;
      result.push({
        signature: shared.signature,
        consumers: shared.consumerCount,
        status: shared.state,
      });
    }
    return result;
  }

  cancelAll(): void {
    for (const group of Array.from(this.groups)) group.cancel();
    for (const shared of Array.from(this.registry.values())) shared.close();
    this.registry.clear();
  }

  private release(shared: SharedSubscription): void {
    if (this.registry.get(shared.signature) === shared) {
      this.registry.delete(shared.signature);
      this.log(`Released ${shared.signature}`);
    }
  }

  private handleFailure(shared: SharedSubscription, error: SyncError): void {
    console.error(`[Orchestrator] Subscription ${shared.signature} failed:`, error.message);
    this.onSubscriptionError?.(shared.signature, error);
  }

  private retryQuietly(handle: WatchHandle): void {
    try {
      handle.retry();
    } catch (err) {
      console.error(`[Orchestrator] Retry of ${handle.signature} failed:`, err);
    }
  }

  private log(message: string): void {
    if (this.debug) console.warn(`[Orchestrator] ${message}`);
  }
}
