/**
 * Entity Store
 *
 * Keyed table of live entities with last-writer-wins merge.
 *
 * - Insert when an identity is first seen
 * - Discard candidates that are not newer than the stored version
 * - Otherwise merge with the entity's policy and notify listeners
 *
 * Upserts are synchronous, so each identity's slot has a single writer and
 * readers only ever see frozen snapshots.
 */

// --- Types ---

export interface MergePolicy<E> {
  /** Declared timestamp used for recency comparison */
  versionOf: (entity: E) => number;
  /** Produce the next version from the stored one and a newer candidate */
  merge: (stored: E, incoming: E) => E;
}

export interface UpsertResult<E> {
  entity: E;
  changed: boolean;
}

export type EntityChange<E> =
  | { type: "upsert"; identity: string; entity: E; previous: E | undefined }
  | { type: "remove"; identity: string; previous: E };

export type ChangeListener<E> = (change: EntityChange<E>) => void;

// --- Freezing ---

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

// --- Store ---

export class EntityStore<E> {
  private entries = new Map<string, E>();
  private listeners = new Set<ChangeListener<E>>();

  constructor(
    private readonly policy: MergePolicy<E>,
    private readonly name: string = "EntityStore"
  ) {}

  upsert(identity: string, candidate: E): UpsertResult<E> {
    const stored = this.entries.get(identity);

    if (stored === undefined) {
      const entity = deepFreeze(candidate);
      this.entries.set(identity, entity);
      this.emit({ type: "upsert", identity, entity, previous: undefined });
      return { entity, changed: true };
    }

    if (this.policy.versionOf(candidate) <= this.policy.versionOf(stored)) {
      return { entity: stored, changed: false };
    }

    const merged = this.policy.merge(stored, candidate);
    if (merged === stored) {
      return { entity: stored, changed: false };
    }

    const entity = deepFreeze(merged);
    this.entries.set(identity, entity);
    this.emit({ type: "upsert", identity, entity, previous: stored });
    return { entity, changed: true };
  }

  /**
   * Put back a snapshot taken before an optimistic write.
   * Removes the entry when there was none.
   */
  restore(identity: string, previous: E | undefined): void {
    const current = this.entries.get(identity);
    if (current === previous) return;

    if (previous === undefined) {
      this.delete(identity);
      return;
    }

    this.entries.set(identity, previous);
    this.emit({ type: "upsert", identity, entity: previous, previous: current });
  }

  /**
   * Remove an entry. Returns false when there was none.
   */
  delete(identity: string): boolean {
    const current = this.entries.get(identity);
    if (current === undefined) return false;

    this.entries.delete(identity);
    this.emit({ type: "remove", identity, previous: current });
    return true;
  }

  get(identity: string): E | undefined {
    return this.entries.get(identity);
  }

  has(identity: string): boolean {
    return this.entries.has(identity);
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  values(): E[] {
    return Array.from(this.entries.values());
  }

  get size(): number {
    return this.entries.size;
  }

  snapshot(): ReadonlyMap<string, E> {
    return new Map(this.entries);
  }

  /**
   * Listen for changes. Returns an unsubscribe function.
   */
  onChange(listener: ChangeListener<E>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  clear(): void {
    this.entries.clear();
  }

  private emit(change: EntityChange<E>): void {
    for (const listener of Array.from(this.listeners)) {
      try {
        listener(change);
      } catch (err) {
        console.error(`[${this.name}] Change listener failed:`, err);
      }
    }
  }
}
