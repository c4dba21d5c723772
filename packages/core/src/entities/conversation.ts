/**
 * Conversation entity
 *
 * Keyed by record id and attached to one project through its `a` tag.
 * Immutable after creation except for title backfill.
 */

import type { SyncRecord } from "../records/record.js";
import {
  addressReference,
  nonEmptyTagValue,
  recordIdentity,
  tagValues,
  updateTarget,
} from "../records/tags.js";
import type { MergePolicy } from "../store/entity-store.js";

export interface Conversation {
  id: string;
  projectIdentity: string;
  creatorId: string;
  title?: string;
  content: string;
  createdAt: number;
  /** Timestamp of the newest record applied */
  updatedAt: number;
  mentionedAgentIds: string[];
  record: SyncRecord;
}

export function parseConversation(record: SyncRecord): Conversation {
  return {
    id: recordIdentity(record),
    projectIdentity: addressReference(record),
    creatorId: record.creator,
    title: nonEmptyTagValue(record, "title"),
    content: updateTarget(record) ? "" : record.content,
    createdAt: record.createdAt,
    updatedAt: record.createdAt,
    mentionedAgentIds: tagValues(record, "p"),
    record,
  };
}

/**
 * Title to show: explicit title, else first content line, else "Untitled".
 */
export function conversationDisplayTitle(conversation: Conversation): string {
  if (conversation.title) return conversation.title;
  const firstLine = conversation.content.split(/\r?\n/)[0]?.trim();
  return firstLine ? firstLine : "Untitled";
}

/**
 * Only the title can be backfilled; everything else stays as first seen.
 */
export function mergeConversation(
  stored: Conversation,
  incoming: Conversation
): Conversation {
  const title = nonEmptyTagValue(incoming.record, "title");
  if (!title || title === stored.title) return stored;

  return { ...stored, title, updatedAt: incoming.updatedAt, record: incoming.record };
}

export const conversationPolicy: MergePolicy<Conversation> = {
  versionOf: (conversation) => conversation.updatedAt,
  merge: mergeConversation,
};
