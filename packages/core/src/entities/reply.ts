/**
 * Reply entity
 *
 * Kind 1111 records threaded under a root: conversation replies, task
 * status updates and lesson comments. The root comes from the uppercase
 * `E` tag when present, else the first `e`.
 */

import type { SyncRecord } from "../records/record.js";
import {
  addressReference,
  nonEmptyTagValue,
  tagValue,
  tagValues,
} from "../records/tags.js";
import type { MergePolicy } from "../store/entity-store.js";

export interface Reply {
  id: string;
  rootId: string;
  parentId?: string;
  projectIdentity?: string;
  creatorId: string;
  content: string;
  createdAt: number;
  mentionedAgentIds: string[];
  phase?: string;
  record: SyncRecord;
}

/** `phase` or, from older agents, `new-phase` */
export function phaseOf(record: SyncRecord): string | undefined {
  return nonEmptyTagValue(record, "phase") ?? nonEmptyTagValue(record, "new-phase");
}

export function parseReply(record: SyncRecord): Reply {
  const root = tagValue(record, "E");
  const parent = tagValue(record, "e");
  const projectIdentity = addressReference(record);

  return {
    id: record.id,
    rootId: root ?? parent ?? "",
    parentId: root !== undefined ? parent : undefined,
    projectIdentity: projectIdentity === "" ? undefined : projectIdentity,
    creatorId: record.creator,
    content: record.content,
    createdAt: record.createdAt,
    mentionedAgentIds: tagValues(record, "p"),
    phase: phaseOf(record),
    record,
  };
}

/** Order replies oldest first, ties broken by id. */
export function compareReplies(a: Reply, b: Reply): number {
  return a.createdAt - b.createdAt || a.id.localeCompare(b.id);
}

export const replyPolicy: MergePolicy<Reply> = {
  versionOf: (reply) => reply.createdAt,
  merge: (stored) => stored,
};
