/**
 * Conversation builders: roots, thread replies and typing signals.
 */

import { z } from "zod";
import type { RecordDraft } from "../records/record.js";
import { RecordKind } from "../records/kinds.js";
import { draft, optionalTag, repeatedTags } from "./draft.js";

export const ConversationIntentSchema = z.object({
  projectIdentity: z.string().min(1),
  content: z.string(),
  title: z.string().optional(),
  mentionAgentIds: z.array(z.string()).default([]),
});

export type ConversationIntent = z.input<typeof ConversationIntentSchema>;

export function buildConversation(intent: ConversationIntent, createdAt?: number): RecordDraft {
  const c = ConversationIntentSchema.parse(intent);

  return draft(
    RecordKind.chat,
    c.content,
    [
      ["a", c.projectIdentity],
      optionalTag("title", c.title),
      ...repeatedTags("p", c.mentionAgentIds),
    ],
    createdAt
  );
}

export const ConversationReplyIntentSchema = z.object({
  conversationId: z.string().min(1),
  content: z.string(),
  /** Reply being answered; the conversation root when omitted */
  parentId: z.string().optional(),
  projectIdentity: z.string().optional(),
  mentionAgentIds: z.array(z.string()).default([]),
  phase: z.string().optional(),
});

export type ConversationReplyIntent = z.input<typeof ConversationReplyIntentSchema>;

export function buildConversationReply(
  intent: ConversationReplyIntent,
  createdAt?: number
): RecordDraft {
  const r = ConversationReplyIntentSchema.parse(intent);

  return draft(
    RecordKind.threadReply,
    r.content,
    [
      ["E", r.conversationId],
      ["e", r.parentId ?? r.conversationId],
      optionalTag("a", r.projectIdentity),
      ...repeatedTags("p", r.mentionAgentIds),
      optionalTag("phase", r.phase),
    ],
    createdAt
  );
}

// --- Typing ---

export const TypingSignalIntentSchema = z.object({
  conversationId: z.string().min(1),
  projectIdentity: z.string().min(1),
  message: z.string().default(""),
  phase: z.string().optional(),
});

export type TypingSignalIntent = z.input<typeof TypingSignalIntentSchema>;

export function buildTypingSignal(intent: TypingSignalIntent, createdAt?: number): RecordDraft {
  const t = TypingSignalIntentSchema.parse(intent);

  return draft(
    RecordKind.typingIndicator,
    t.message,
    [["e", t.conversationId], ["a", t.projectIdentity], optionalTag("phase", t.phase)],
    createdAt
  );
}

export type TypingStopIntent = Pick<TypingSignalIntent, "conversationId" | "projectIdentity">;

export function buildTypingStop(intent: TypingStopIntent, createdAt?: number): RecordDraft {
  const t = TypingSignalIntentSchema.pick({ conversationId: true, projectIdentity: true }).parse(
    intent
  );

  return draft(
    RecordKind.typingIndicatorStop,
    "",
    [["e", t.conversationId], ["a", t.projectIdentity]],
    createdAt
  );
}
