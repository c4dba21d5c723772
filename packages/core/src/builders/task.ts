/**
 * Task builders
 */

import { z } from "zod";
import type { RecordDraft } from "../records/record.js";
import { RecordKind } from "../records/kinds.js";
import { UPDATE_MARKER } from "../records/tags.js";
import { draft, optionalTag, repeatedTags } from "./draft.js";

/** Fourth element of the `e` tag on an abort record */
export const ABORT_MARKER = "task";

export const TaskIntentSchema = z.object({
  projectIdentity: z.string().min(1),
  title: z.string().min(1),
  content: z.string().default(""),
  status: z.string().optional(),
  assignees: z.array(z.string()).default([]),
  branch: z.string().optional(),
  conversationId: z.string().optional(),
});

export type TaskIntent = z.input<typeof TaskIntentSchema>;

export function buildTask(intent: TaskIntent, createdAt?: number): RecordDraft {
  const t = TaskIntentSchema.parse(intent);

  return draft(
    RecordKind.task,
    t.content,
    [
      ["a", t.projectIdentity],
      ["title", t.title],
      optionalTag("status", t.status),
      ...repeatedTags("p", t.assignees),
      optionalTag("branch", t.branch),
      optionalTag("e", t.conversationId),
    ],
    createdAt
  );
}

export const TaskUpdateIntentSchema = z.object({
  taskId: z.string().min(1),
  projectIdentity: z.string().optional(),
  title: z.string().optional(),
  content: z.string().default(""),
  status: z.string().optional(),
  assignees: z.array(z.string()).default([]),
  branch: z.string().optional(),
});

export type TaskUpdateIntent = z.input<typeof TaskUpdateIntentSchema>;

/**
 * Update record for an existing task. Only the fields given are changed.
 */
export function buildTaskUpdate(intent: TaskUpdateIntent, createdAt?: number): RecordDraft {
  const u = TaskUpdateIntentSchema.parse(intent);

  return draft(
    RecordKind.task,
    u.content,
    [
      ["e", u.taskId, "", UPDATE_MARKER],
      optionalTag("a", u.projectIdentity),
      optionalTag("title", u.title),
      optionalTag("status", u.status),
      ...repeatedTags("p", u.assignees),
      optionalTag("branch", u.branch),
    ],
    createdAt
  );
}

export const TaskAbortIntentSchema = z.object({
  taskId: z.string().min(1),
});

export type TaskAbortIntent = z.input<typeof TaskAbortIntentSchema>;

export function buildTaskAbort(intent: TaskAbortIntent, createdAt?: number): RecordDraft {
  const { taskId } = TaskAbortIntentSchema.parse(intent);
  return draft(RecordKind.taskAbort, "abort", [["e", taskId, "", ABORT_MARKER]], createdAt);
}
