/**
 * strata_tasks - Task List Tool
 *
 * Mental model: "What work is tracked in this project, and where is it?"
 */

import { RecordKind, type SyncSession } from "@strata/core";
import { describeError, refreshFromNetwork, type ToolResult } from "./result.js";

export interface TasksInput {
  projectIdentity: string;
  status?: string;
  assignee?: string;
}

export interface TaskSummary {
  id: string;
  title: string;
  status?: string;
  assignees: string[];
  branch?: string;
  updatedAt: number;
}

export interface TasksOutput {
  success: boolean;
  tasks: TaskSummary[];
  count: number;
  stale: boolean;
  error?: string;
}

export async function tasksHandler(
  session: SyncSession,
  input: TasksInput
): Promise<ToolResult<TasksOutput>> {
  let stale: boolean;
  try {
    stale = await refreshFromNetwork(session, {
      kinds: [RecordKind.task],
      tags: { a: [input.projectIdentity] },
    });
  } catch (err) {
    const error = describeError(err);
    return {
      content: [{ type: "text", text: `Error: ${error}` }],
      structuredContent: { success: false, tasks: [], count: 0, stale: true, error },
    };
  }

  const tasks = session
    .projectTasks(input.projectIdentity)
    .filter((t) => input.status === undefined || t.status === input.status)
    .filter((t) => input.assignee === undefined || t.assignees.includes(input.assignee))
    .map((task): TaskSummary => ({
      id: task.id,
      title: task.title,
      status: task.status,
      assignees: task.assignees,
      branch: task.branch,
      updatedAt: task.updatedAt,
    }));

  const text =
    tasks.length === 0
      ? `No matching tasks in ${input.projectIdentity}`
      : tasks.map((t) => `- [${t.status ?? "no status"}] ${t.title} (${t.id})`).join("\n");

  return {
    content: [{ type: "text", text }],
    structuredContent: { success: true, tasks, count: tasks.length, stale },
  };
}
