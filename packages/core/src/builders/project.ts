/**
 * Project builders
 *
 * Projects are addressable: every record carries the full state, so an
 * update is a new record for the same `d` slug.
 */

import { z } from "zod";
import type { RecordDraft } from "../records/record.js";
import { RecordKind } from "../records/kinds.js";
import type { Project } from "../entities/project.js";
import { LLMConfigPayloadSchema } from "../entities/status.js";
import { draft, optionalTag, repeatedTags } from "./draft.js";

export const ProjectIntentSchema = z.object({
  slug: z.string().min(1),
  title: z.string().optional(),
  description: z.string().optional(),
  repoUrl: z.string().optional(),
  imageUrl: z.string().optional(),
  agentIds: z.array(z.string()).default([]),
  toolIds: z.array(z.string()).default([]),
  hashtags: z.array(z.string()).default([]),
});

export type ProjectIntent = z.input<typeof ProjectIntentSchema>;

export function buildProject(intent: ProjectIntent, createdAt?: number): RecordDraft {
  const p = ProjectIntentSchema.parse(intent);
  const hashtags = p.hashtags.filter((h) => h !== "");

  return draft(
    RecordKind.project,
    p.description ?? "",
    [
      ["d", p.slug],
      optionalTag("title", p.title),
      optionalTag("repo", p.repoUrl),
      optionalTag("picture", p.imageUrl),
      ...repeatedTags("agent", p.agentIds),
      ...repeatedTags("mcp", p.toolIds),
      hashtags.length > 0 ? ["hashtags", ...hashtags] : null,
    ],
    createdAt
  );
}

export type ProjectChanges = Omit<ProjectIntent, "slug">;

/**
 * Full replacement record for an existing project with `changes` applied.
 * The timestamp is moved past the stored version so the update wins.
 */
export function buildProjectUpdate(
  project: Project,
  changes: ProjectChanges,
  createdAt?: number
): RecordDraft {
  const next = buildProject(
    {
      slug: project.slug,
      title: project.title,
      description: project.description,
      repoUrl: project.repoUrl,
      imageUrl: project.imageUrl,
      agentIds: project.agentIds,
      toolIds: project.toolIds,
      hashtags: project.hashtags,
      ...changes,
    },
    createdAt
  );

  return { ...next, createdAt: Math.max(next.createdAt, project.createdAt + 1) };
}

// --- Status ---

export const ProjectStatusIntentSchema = z.object({
  projectIdentity: z.string().min(1),
  agents: z
    .array(z.object({ agentId: z.string().min(1), slug: z.string().min(1) }))
    .default([]),
});

export type ProjectStatusIntent = z.input<typeof ProjectStatusIntentSchema>;

export function buildProjectStatus(intent: ProjectStatusIntent, createdAt?: number): RecordDraft {
  const s = ProjectStatusIntentSchema.parse(intent);

  return draft(
    RecordKind.projectStatus,
    "",
    [["a", s.projectIdentity], ...s.agents.map((a) => ["agent", a.agentId, a.slug])],
    createdAt
  );
}

// --- LLM config ---

export const LLMConfigChangeIntentSchema = LLMConfigPayloadSchema.extend({
  projectIdentity: z.string().min(1),
});

export type LLMConfigChangeIntent = z.input<typeof LLMConfigChangeIntentSchema>;

export function buildLLMConfigChange(
  intent: LLMConfigChangeIntent,
  createdAt?: number
): RecordDraft {
  const { projectIdentity, ...payload } = LLMConfigChangeIntentSchema.parse(intent);

  return draft(
    RecordKind.llmConfigChange,
    JSON.stringify(payload),
    [["a", projectIdentity]],
    createdAt
  );
}
