/**
 * Phase tracker
 *
 * Latest phase per conversation, taken from thread replies that carry a
 * `phase` (or `new-phase`) tag. Last writer wins by createdAt.
 */

import type { SyncRecord } from "../records/record.js";
import { RecordKind } from "../records/kinds.js";
import { tagValue } from "../records/tags.js";
import { phaseOf } from "../entities/reply.js";
import { EntityStore, type MergePolicy } from "../store/entity-store.js";

export interface ConversationPhase {
  conversationId: string;
  phase: string;
  creatorId: string;
  updatedAt: number;
}

const phasePolicy: MergePolicy<ConversationPhase> = {
  versionOf: (entry) => entry.updatedAt,
  merge: (_stored, incoming) => incoming,
};

export class PhaseTracker {
  readonly store = new EntityStore<ConversationPhase>(phasePolicy, "PhaseTracker");

  reduce(record: SyncRecord): boolean {
    if (record.kind !== RecordKind.threadReply) return false;

    const phase = phaseOf(record);
    const conversationId = tagValue(record, "E") ?? tagValue(record, "e");
    if (!phase || !conversationId) return false;

    return this.store.upsert(conversationId, {
      conversationId,
      phase,
      creatorId: record.creator,
      updatedAt: record.createdAt,
    }).changed;
  }

  current(conversationId: string): string | undefined {
    return this.store.get(conversationId)?.phase;
  }
}
