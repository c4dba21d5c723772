/**
 * Agent builders: profiles, lessons and lesson comments.
 */

import { z } from "zod";
import type { RecordDraft } from "../records/record.js";
import { RecordKind } from "../records/kinds.js";
import { UPDATE_MARKER } from "../records/tags.js";
import { draft, optionalTag, repeatedTags } from "./draft.js";

export const AgentProfileIntentSchema = z.object({
  name: z.string().min(1),
  instructions: z.string().default(""),
  description: z.string().optional(),
  role: z.string().optional(),
  usageCriteria: z.string().optional(),
  version: z.string().optional(),
  labels: z.array(z.string()).default([]),
  /** Id of the profile this record updates */
  updates: z.string().optional(),
});

export type AgentProfileIntent = z.input<typeof AgentProfileIntentSchema>;

export function buildAgentProfile(intent: AgentProfileIntent, createdAt?: number): RecordDraft {
  const a = AgentProfileIntentSchema.parse(intent);

  return draft(
    RecordKind.agentConfig,
    a.instructions,
    [
      a.updates ? ["e", a.updates, "", UPDATE_MARKER] : null,
      ["title", a.name],
      optionalTag("description", a.description),
      optionalTag("role", a.role),
      optionalTag("use-criteria", a.usageCriteria),
      optionalTag("ver", a.version),
      ...repeatedTags("t", a.labels),
    ],
    createdAt
  );
}

// --- Lessons ---

export const LessonIntentSchema = z.object({
  projectIdentity: z.string().min(1),
  title: z.string().min(1),
  content: z.string(),
  lessonType: z.string().optional(),
  agentName: z.string().optional(),
});

export type LessonIntent = z.input<typeof LessonIntentSchema>;

/**
 * Lesson content is JSON `{ title, content }`; the title tag is kept for
 * readers that do not decode it.
 */
export function buildLesson(intent: LessonIntent, createdAt?: number): RecordDraft {
  const l = LessonIntentSchema.parse(intent);

  return draft(
    RecordKind.agentLesson,
    JSON.stringify({ title: l.title, content: l.content }),
    [
      ["a", l.projectIdentity],
      ["title", l.title],
      optionalTag("lesson-type", l.lessonType),
      optionalTag("agent-name", l.agentName),
    ],
    createdAt
  );
}

export const LessonCommentIntentSchema = z.object({
  lessonId: z.string().min(1),
  /** Agent that published the lesson */
  lessonAuthorId: z.string().min(1),
  content: z.string().min(1),
  projectIdentity: z.string().optional(),
});

export type LessonCommentIntent = z.input<typeof LessonCommentIntentSchema>;

export function buildLessonComment(intent: LessonCommentIntent, createdAt?: number): RecordDraft {
  const c = LessonCommentIntentSchema.parse(intent);
  const lessonKind = String(RecordKind.agentLesson);

  return draft(
    RecordKind.threadReply,
    c.content,
    [
      ["E", c.lessonId],
      ["K", lessonKind],
      ["P", c.lessonAuthorId],
      ["e", c.lessonId],
      ["k", lessonKind],
      ["p", c.lessonAuthorId],
      optionalTag("a", c.projectIdentity),
    ],
    createdAt
  );
}
