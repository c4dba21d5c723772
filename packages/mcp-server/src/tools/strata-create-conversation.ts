/**
 * strata_create_conversation - Start a Conversation
 *
 * Publishes a new chat record in a project, optionally mentioning agents.
 */

import { conversationDisplayTitle, type SyncSession } from "@strata/core";
import { describeError, type ToolResult } from "./result.js";

export interface CreateConversationInput {
  projectIdentity: string;
  content: string;
  title?: string;
  mentionAgentIds?: string[];
}

export interface CreateConversationOutput {
  success: boolean;
  conversation?: { id: string; title: string; createdAt: number };
  error?: string;
}

export async function createConversationHandler(
  session: SyncSession,
  input: CreateConversationInput
): Promise<ToolResult<CreateConversationOutput>> {
  if (input.content.trim().length === 0) {
    return {
      content: [{ type: "text", text: "Error: Content is required" }],
      structuredContent: { success: false, error: "Content is required" },
    };
  }

  try {
    const conversation = await session.publishConversation({
      projectIdentity: input.projectIdentity,
      content: input.content,
      title: input.title,
      mentionAgentIds: input.mentionAgentIds,
    });
    const title = conversationDisplayTitle(conversation);

    return {
      content: [{ type: "text", text: `Started "${title}" [${conversation.id}]` }],
      structuredContent: {
        success: true,
        conversation: { id: conversation.id, title, createdAt: conversation.createdAt },
      },
    };
  } catch (err) {
    const error = describeError(err);
    return {
      content: [{ type: "text", text: `Error: ${error}` }],
      structuredContent: { success: false, error },
    };
  }
}
