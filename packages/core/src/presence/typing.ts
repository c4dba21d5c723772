/**
 * Typing reducer
 *
 * Tracks who is typing in which conversation. One entry per conversation
 * and creator; a stop record clears the entry it is not older than, and
 * start records older than the last stop are ignored. `active()` checks
 * validity on read; signals and stop markers that fall out of the validity
 * window behind the newest record seen are pruned as records arrive.
 */

import type { SyncRecord } from "../records/record.js";
import { RecordKind } from "../records/kinds.js";
import { tagValue } from "../records/tags.js";
import {
  TYPING_VALIDITY_SECONDS,
  isTypingSignalValid,
  parseTypingSignal,
  typingSignalPolicy,
  type TypingSignal,
} from "../entities/status.js";
import { EntityStore } from "../store/entity-store.js";

export function typingKey(conversationId: string, creatorId: string): string {
  return `${conversationId}:${creatorId}`;
}

export class TypingReducer {
  readonly store = new EntityStore<TypingSignal>(typingSignalPolicy, "TypingReducer");
  private stoppedAt = new Map<string, number>();
  private horizon = 0;

  /**
   * Returns true when the record changed typing state.
   */
  reduce(record: SyncRecord): boolean {
    const isStart = record.kind === RecordKind.typingIndicator;
    if (!isStart && record.kind !== RecordKind.typingIndicatorStop) return false;

    // Never trust a clock ahead of ours
    const observed = Math.min(record.createdAt, Math.floor(Date.now() / 1000));
    if (observed - TYPING_VALIDITY_SECONDS > this.horizon) {
      this.prune(observed - TYPING_VALIDITY_SECONDS);
    }
    if (record.createdAt <= this.horizon) return false;

    return isStart ? this.start(record) : this.stop(record);
  }

  /**
   * Drop signals and stop markers observed at or before `horizon` (unix
   * seconds). Later records that old are ignored. Returns how many signals
   * were removed.
   */
  prune(horizon: number): number {
    this.horizon = Math.max(this.horizon, horizon);

    for (const [key, stoppedAt] of this.stoppedAt) {
      if (stoppedAt <= this.horizon) this.stoppedAt.delete(key);
    }

    let removed = 0;
    for (const [key, signal] of this.store.snapshot()) {
      if (signal.observedAt <= this.horizon && this.store.delete(key)) removed += 1;
    }
    return removed;
  }

  /** Stop markers still held back against late starts */
  get pendingStops(): number {
    return this.stoppedAt.size;
  }

  /** Valid signals for a conversation, oldest first */
  active(conversationId: string, nowMs: number = Date.now()): TypingSignal[] {
    return this.store
      .values()
      .filter((s) => s.conversationId === conversationId && isTypingSignalValid(s, nowMs))
      .sort((a, b) => a.observedAt - b.observedAt);
  }

  private start(record: SyncRecord): boolean {
    const signal = parseTypingSignal(record);
    if (signal.conversationId === "") return false;

    const key = typingKey(signal.conversationId, signal.creatorId);
    const stopped = this.stoppedAt.get(key);
    if (stopped !== undefined && signal.observedAt <= stopped) return false;

    return this.store.upsert(key, signal).changed;
  }

  private stop(record: SyncRecord): boolean {
    const conversationId = tagValue(record, "e");
    if (!conversationId) return false;

    const key = typingKey(conversationId, record.creator);
    this.stoppedAt.set(key, Math.max(this.stoppedAt.get(key) ?? 0, record.createdAt));

    const current = this.store.get(key);
    if (!current || current.observedAt > record.createdAt) return false;
    return this.store.delete(key);
  }
}
