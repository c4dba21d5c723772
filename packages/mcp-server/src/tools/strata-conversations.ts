/**
 * strata_conversations - Conversation List Tool
 *
 * Mental model: "What is being discussed in this project?"
 */

import {
  RecordKind,
  conversationDisplayTitle,
  type SyncSession,
} from "@strata/core";
import { describeError, refreshFromNetwork, type ToolResult } from "./result.js";

const DEFAULT_LIMIT = 20;

export interface ConversationsInput {
  projectIdentity: string;
  limit?: number;
}

export interface ConversationSummary {
  id: string;
  title: string;
  creatorId: string;
  createdAt: number;
  /** Creators currently typing in the conversation */
  typing: string[];
}

export interface ConversationsOutput {
  success: boolean;
  conversations: ConversationSummary[];
  count: number;
  stale: boolean;
  error?: string;
}

export async function conversationsHandler(
  session: SyncSession,
  input: ConversationsInput,
  nowMs: number = Date.now()
): Promise<ToolResult<ConversationsOutput>> {
  let stale: boolean;
  try {
    stale = await refreshFromNetwork(session, {
      kinds: [RecordKind.chat],
      tags: { a: [input.projectIdentity] },
    });
  } catch (err) {
    const error = describeError(err);
    return {
      content: [{ type: "text", text: `Error: ${error}` }],
      structuredContent: { success: false, conversations: [], count: 0, stale: true, error },
    };
  }

  const conversations = session
    .projectConversations(input.projectIdentity)
    .slice(0, input.limit ?? DEFAULT_LIMIT)
    .map((conversation): ConversationSummary => ({
      id: conversation.id,
      title: conversationDisplayTitle(conversation),
      creatorId: conversation.creatorId,
      createdAt: conversation.createdAt,
      typing: session.typing.active(conversation.id, nowMs).map((s) => s.creatorId),
    }));

  const text =
    conversations.length === 0
      ? `No conversations in ${input.projectIdentity}`
      : conversations.map((c) => `- ${c.title} [${c.id}]`).join("\n");

  return {
    content: [{ type: "text", text }],
    structuredContent: { success: true, conversations, count: conversations.length, stale },
  };
}
