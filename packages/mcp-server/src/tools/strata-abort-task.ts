/**
 * strata_abort_task - Ask the agent running a task to stop
 *
 * Publishes an abort signal. The signal is ephemeral: only agents watching
 * the task at the time receive it.
 */

import type { SyncSession } from "@strata/core";
import { describeError, type ToolResult } from "./result.js";

export interface AbortTaskInput {
  taskId: string;
}

export interface AbortTaskOutput {
  success: boolean;
  taskId: string;
  /** Title of the task when the session knows it */
  title?: string;
  recordId?: string;
  error?: string;
}

export async function abortTaskHandler(
  session: SyncSession,
  input: AbortTaskInput
): Promise<ToolResult<AbortTaskOutput>> {
  const task = session.stores.tasks.get(input.taskId);

  try {
    const record = await session.publishTaskAbort(input.taskId);
    const label = task ? `"${task.title}"` : input.taskId;

    return {
      content: [{ type: "text", text: `Abort requested for ${label}` }],
      structuredContent: {
        success: true,
        taskId: input.taskId,
        title: task?.title,
        recordId: record.id,
      },
    };
  } catch (err) {
    const error = describeError(err);
    return {
      content: [{ type: "text", text: `Error: ${error}` }],
      structuredContent: { success: false, taskId: input.taskId, error },
    };
  }
}
