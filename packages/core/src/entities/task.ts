/**
 * Task entity
 *
 * Keyed by record id. Update records (`["e", taskId, "", "update"]`) refresh
 * status, assignees and branch; title and content only change when the
 * update carries a non-empty value.
 */

import type { SyncRecord } from "../records/record.js";
import {
  addressReference,
  eventReference,
  nonEmptyTagValue,
  recordIdentity,
  tagValues,
} from "../records/tags.js";
import type { MergePolicy } from "../store/entity-store.js";

export const DEFAULT_TASK_TITLE = "Untitled Task";

export interface Task {
  id: string;
  projectIdentity: string;
  creatorId: string;
  title: string;
  content: string;
  status?: string;
  assignees: string[];
  branch?: string;
  relatedConversationId?: string;
  createdAt: number;
  updatedAt: number;
  record: SyncRecord;
}

export function parseTask(record: SyncRecord): Task {
  return {
    id: recordIdentity(record),
    projectIdentity: addressReference(record),
    creatorId: record.creator,
    title: nonEmptyTagValue(record, "title") ?? DEFAULT_TASK_TITLE,
    content: record.content,
    status: nonEmptyTagValue(record, "status"),
    assignees: tagValues(record, "p"),
    branch: nonEmptyTagValue(record, "branch"),
    relatedConversationId: eventReference(record),
    createdAt: record.createdAt,
    updatedAt: record.createdAt,
    record,
  };
}

export function isAssignedTo(task: Task, agentId: string): boolean {
  return task.assignees.includes(agentId);
}

export function mergeTask(stored: Task, incoming: Task): Task {
  const next = incoming.record;
  const assignees = tagValues(next, "p");

  return {
    ...stored,
    projectIdentity: stored.projectIdentity || incoming.projectIdentity,
    title: nonEmptyTagValue(next, "title") ?? stored.title,
    content: incoming.content !== "" ? incoming.content : stored.content,
    status: nonEmptyTagValue(next, "status") ?? stored.status,
    assignees: assignees.length > 0 ? assignees : stored.assignees,
    branch: nonEmptyTagValue(next, "branch") ?? stored.branch,
    relatedConversationId: stored.relatedConversationId ?? incoming.relatedConversationId,
    updatedAt: incoming.updatedAt,
    record: next,
  };
}

export const taskPolicy: MergePolicy<Task> = {
  versionOf: (task) => task.updatedAt,
  merge: mergeTask,
};
