/**
 * Tool result helpers shared by the strata_* handlers
 */

import { ZodError } from "zod";
import { isSyncError, type RecordFilter, type SyncSession } from "@strata/core";

export interface ToolResult<T> {
  content: Array<{ type: "text"; text: string }>;
  structuredContent: T;
}

export function describeError(err: unknown): string {
  if (err instanceof ZodError) {
    return `Invalid input: ${err.issues.map((i) => `${i.path.join(".") || "input"} ${i.message}`).join("; ")}`;
  }
  if (isSyncError(err)) return `${err.code}: ${err.message}`;
  return err instanceof Error ? err.message : "Unknown error";
}

/**
 * Pull the latest matching records into the session. Returns true when the
 * transport failed and the caller is serving what the stores already hold.
 */
export async function refreshFromNetwork(
  session: SyncSession,
  filter: RecordFilter
): Promise<boolean> {
  try {
    await session.refresh(filter);
    return false;
  } catch (err) {
    if (!isSyncError(err)) throw err;
    console.error(`[MCP] Serving cached records: ${err.message}`);
    return true;
  }
}
