/**
 * Task abort inbox
 *
 * Abort records are delivered once each. A signal waits in the inbox until
 * it is consumed, or goes straight to the driver registered for its task.
 * The ids of delivered records are remembered up to `maxSeen`, oldest
 * forgotten first.
 */

import type { SyncRecord } from "../records/record.js";
import { RecordKind } from "../records/kinds.js";
import { parseTaskAbort, type TaskAbortSignal } from "../entities/status.js";

export type AbortHandler = (signal: TaskAbortSignal) => void;

const DEFAULT_MAX_SEEN = 1000;

export class TaskAbortInbox {
  private seen = new Set<string>();
  private pending = new Map<string, TaskAbortSignal>();
  private drivers = new Map<string, AbortHandler>();

  constructor(private readonly maxSeen: number = DEFAULT_MAX_SEEN) {}

  /**
   * Returns true when the record was a new abort.
   */
  reduce(record: SyncRecord): boolean {
    if (record.kind !== RecordKind.taskAbort) return false;
    if (this.seen.has(record.id)) return false;

    const signal = parseTaskAbort(record);
    if (signal.taskId === "") {
      console.warn(`[TaskAbortInbox] Ignoring abort ${record.id} without task reference`);
      return false;
    }
    this.remember(record.id);

    const driver = this.drivers.get(signal.taskId);
    if (driver) {
      this.drivers.delete(signal.taskId);
      this.dispatch(driver, signal);
    } else if (!this.pending.has(signal.taskId)) {
      this.pending.set(signal.taskId, signal);
    }
    return true;
  }

  /**
   * Remove and return the pending abort for a task.
   */
  consume(taskId: string): TaskAbortSignal | undefined {
    const signal = this.pending.get(taskId);
    this.pending.delete(taskId);
    return signal;
  }

  /**
   * Hand the next abort for `taskId` to `handler`, once. A pending abort is
   * handed over immediately. Returns a function that unregisters the handler.
   */
  onAbort(taskId: string, handler: AbortHandler): () => void {
    const waiting = this.consume(taskId);
    if (waiting) {
      this.dispatch(handler, waiting);
      return () => {};
    }

    this.drivers.set(taskId, handler);
    return () => {
      if (this.drivers.get(taskId) === handler) this.drivers.delete(taskId);
    };
  }

  pendingTaskIds(): string[] {
    return Array.from(this.pending.keys());
  }

  get seenCount(): number {
    return this.seen.size;
  }

  private remember(id: string): void {
    this.seen.add(id);
    while (this.seen.size > this.maxSeen) {
      const oldest = this.seen.values().next();
      if (oldest.done) break;
      this.seen.delete(oldest.value);
    }
  }

  private dispatch(handler: AbortHandler, signal: TaskAbortSignal): void {
    try {
      handler(signal);
    } catch (err) {
      console.error(`[TaskAbortInbox] Abort handler for ${signal.taskId} failed:`, err);
    }
  }
}
