/**
 * Lesson entity
 *
 * Lessons are immutable records published by agents. Content is usually
 * JSON `{ title, content }`; anything else is kept as raw text.
 */

import { z } from "zod";
import type { SyncRecord } from "../records/record.js";
import { addressReference, nonEmptyTagValue } from "../records/tags.js";
import type { MergePolicy } from "../store/entity-store.js";
import { decodeJson } from "./json.js";

export const DEFAULT_LESSON_TITLE = "Untitled Lesson";

export const LessonContentSchema = z.object({
  title: z.string().optional(),
  content: z.string().optional(),
});

export type LessonContent = z.infer<typeof LessonContentSchema>;

export interface Lesson {
  id: string;
  agentId: string;
  projectIdentity: string;
  title: string;
  content: string;
  createdAt: number;
  lessonType?: string;
  agentName?: string;
  record: SyncRecord;
}

export function parseLesson(record: SyncRecord): Lesson {
  const decoded = LessonContentSchema.safeParse(decodeJson(record.content));
  const titleTag = nonEmptyTagValue(record, "title");

  let title: string;
  let content: string;
  if (decoded.success) {
    title = decoded.data.title || titleTag || DEFAULT_LESSON_TITLE;
    content = decoded.data.content ?? record.content;
  } else {
    title = titleTag ?? DEFAULT_LESSON_TITLE;
    content = record.content;
  }

  return {
    id: record.id,
    agentId: record.creator,
    projectIdentity: addressReference(record),
    title,
    content,
    createdAt: record.createdAt,
    lessonType: nonEmptyTagValue(record, "lesson-type"),
    agentName: nonEmptyTagValue(record, "agent-name"),
    record,
  };
}

/** Lessons never change once seen. */
export const lessonPolicy: MergePolicy<Lesson> = {
  versionOf: (lesson) => lesson.createdAt,
  merge: (stored) => stored,
};
