#!/usr/bin/env node
/**
 * Strata MCP Server
 *
 * Exposes the live agent workspace to MCP clients.
 *
 * Tools:
 *   strata_projects             - Projects with online state and agents
 *   strata_conversations        - Conversations in a project
 *   strata_tasks                - Tasks in a project
 *   strata_create_conversation  - Start a conversation in a project
 *   strata_abort_task           - Ask the agent running a task to stop
 */

// Load .env file before any other imports that use config
// Note: quiet mode prevents stdout pollution that breaks MCP JSON-RPC
import { config as loadDotenv } from "dotenv";
loadDotenv({ quiet: true });

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import * as z from "zod";
import { loadSyncConfig } from "@strata/core";
import { initTelemetry, shutdownTelemetry } from "@strata/telemetry";

import { createServerSession } from "./session.js";
import type { ToolResult } from "./tools/result.js";
import { projectsHandler } from "./tools/strata-projects.js";
import { conversationsHandler } from "./tools/strata-conversations.js";
import { tasksHandler } from "./tools/strata-tasks.js";
import { createConversationHandler } from "./tools/strata-create-conversation.js";
import { abortTaskHandler } from "./tools/strata-abort-task.js";

// Initialize telemetry (ON by default, opt-out via ~/.strata/config.json)
const telemetry = initTelemetry();
telemetry.setConnector("mcp-server");

const config = loadSyncConfig();
const { session } = createServerSession(config, telemetry);

// Keep projects and their status live so online state is known
const projectWatch = session.watchProjects();
// Typing is never stored, so each listed conversation needs a live watch
const typingWatch = session.watchConversationTyping();

/**
 * Wrapper to track tool execution with telemetry and append the
 * structured result as JSON
 */
async function withTelemetry<T extends { success: boolean }>(
  toolName: string,
  handler: () => Promise<ToolResult<T>>
) {
  const startTime = Date.now();
  try {
    const result = await handler();
    telemetry.trackToolCall(toolName, result.structuredContent.success, Date.now() - startTime);
    const jsonContent = JSON.stringify(result.structuredContent, null, 2);
    return {
      content: [...result.content, { type: "text" as const, text: `\n---\n${jsonContent}` }],
    };
  } catch (error) {
    telemetry.trackToolCall(toolName, false, Date.now() - startTime);
    throw error;
  }
}

const server = new McpServer({
  name: "strata",
  version: "0.1.0",
});

const projectIdentity = z
  .string()
  .min(1)
  .describe("Project address, e.g. '31933:<creator>:<slug>' (see strata_projects)");

// --- strata_projects ---
server.registerTool(
  "strata_projects",
  {
    title: "List Projects",
    description:
      "List workspace projects with their online state.\n\n" +
      "A project is online while its agents keep publishing status. " +
      "Online projects list the agents currently available.",
    inputSchema: {
      onlineOnly: z.boolean().optional().describe("Only list online projects"),
    },
  },
  async (input) => withTelemetry("strata_projects", () => projectsHandler(session, input))
);

// --- strata_conversations ---
server.registerTool(
  "strata_conversations",
  {
    title: "List Conversations",
    description:
      "List the newest conversations in a project, with who is typing in each.\n\n" +
      "Typing is only seen once a conversation has been listed.",
    inputSchema: {
      projectIdentity,
      limit: z.number().int().positive().optional().describe("Maximum conversations (default: 20)"),
    },
  },
  async (input) =>
    withTelemetry("strata_conversations", () => conversationsHandler(session, input))
);

// --- strata_tasks ---
server.registerTool(
  "strata_tasks",
  {
    title: "List Tasks",
    description: "List tasks in a project, newest first, optionally by status or assignee.",
    inputSchema: {
      projectIdentity,
      status: z.string().optional().describe("Only tasks with this status"),
      assignee: z.string().optional().describe("Only tasks assigned to this agent"),
    },
  },
  async (input) => withTelemetry("strata_tasks", () => tasksHandler(session, input))
);

// --- strata_create_conversation ---
server.registerTool(
  "strata_create_conversation",
  {
    title: "Start Conversation",
    description:
      "Start a conversation in a project.\n\n" +
      "Mention agents by id to ask them to respond. Requires a configured creator.",
    inputSchema: {
      projectIdentity,
      content: z.string().describe("First message"),
      title: z.string().optional().describe("Conversation title"),
      mentionAgentIds: z.array(z.string()).optional().describe("Agents to mention"),
    },
  },
  async (input) =>
    withTelemetry("strata_create_conversation", () => createConversationHandler(session, input))
);

// --- strata_abort_task ---
server.registerTool(
  "strata_abort_task",
  {
    title: "Abort Task",
    description:
      "Ask the agent running a task to stop. Only agents connected now receive the request.",
    inputSchema: {
      taskId: z.string().min(1).describe("Task id (see strata_tasks)"),
    },
  },
  async (input) => withTelemetry("strata_abort_task", () => abortTaskHandler(session, input))
);

// Start server with stdio transport
async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("Strata MCP server running on stdio");
}

// Graceful shutdown handlers to flush telemetry events
async function shutdown(signal: string) {
  console.error(`\n${signal} received, shutting down...`);
  typingWatch.cancel();
  projectWatch.cancel();
  session.shutdown();
  await shutdownTelemetry();
  process.exit(0);
}

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));

main().catch(async (error) => {
  console.error("Fatal error:", error);
  await shutdownTelemetry();
  process.exit(1);
});
