/**
 * strata_projects - Project Overview Tool
 *
 * Mental model: "Which projects exist and who is working on them?"
 *
 * Lists known projects with their online state and the agents the latest
 * status announced. Online state comes from live status records, so it is
 * only known for projects the server is watching.
 */

import { RecordKind, type SyncSession } from "@strata/core";
import { describeError, refreshFromNetwork, type ToolResult } from "./result.js";

// --- Types ---

export interface ProjectsInput {
  onlineOnly?: boolean;
}

export interface ProjectSummary {
  identity: string;
  slug: string;
  title: string;
  description?: string;
  online: boolean;
  agents: string[];
  lastStatusAt?: number;
}

export interface ProjectsOutput {
  success: boolean;
  projects: ProjectSummary[];
  count: number;
  stale: boolean;
  error?: string;
}

// --- Handler ---

export async function projectsHandler(
  session: SyncSession,
  input: ProjectsInput,
  nowMs: number = Date.now()
): Promise<ToolResult<ProjectsOutput>> {
  let stale: boolean;
  try {
    stale = await refreshFromNetwork(session, { kinds: [RecordKind.project] });
  } catch (err) {
    const error = describeError(err);
    return {
      content: [{ type: "text", text: `Error: ${error}` }],
      structuredContent: { success: false, projects: [], count: 0, stale: true, error },
    };
  }

  const projects = session.stores.projects
    .values()
    .map((project): ProjectSummary => {
      const online = session.statuses.isOnline(project.identity, nowMs);
      return {
        identity: project.identity,
        slug: project.slug,
        title: project.title,
        description: project.description,
        online,
        agents: session.statuses.onlineAgents(project.identity, nowMs).map((a) => a.slug),
        lastStatusAt: session.statuses.get(project.identity)?.observedAt,
      };
    })
    .filter((p) => !input.onlineOnly || p.online)
    .sort((a, b) => a.title.localeCompare(b.title));

  const lines = projects.map((p) => {
    const state = p.online ? `online: ${p.agents.join(", ") || "no agents"}` : "offline";
    return `- ${p.title} (${p.identity}) ${state}`;
  });
  const online = projects.filter((p) => p.online).length;
  const plural = projects.length === 1 ? "" : "s";
  const header = `${projects.length} project${plural}, ${online} online${stale ? " (cached)" : ""}`;

  return {
    content: [{ type: "text", text: [header, ...lines].join("\n") }],
    structuredContent: { success: true, projects, count: projects.length, stale },
  };
}
