/**
 * Agent profile entity
 *
 * Instructions live in the content as markdown; metadata in tags.
 * Identity is `creator:recordId`, so update records from the same creator
 * refresh the profile they point at.
 */

import type { SyncRecord } from "../records/record.js";
import { nonEmptyTagValue, recordIdentity, tagValues } from "../records/tags.js";
import type { MergePolicy } from "../store/entity-store.js";

export const DEFAULT_AGENT_NAME = "Untitled Agent";

export interface AgentProfile {
  id: string;
  identity: string;
  creatorId: string;
  displayName: string;
  instructionsMarkdown: string;
  description?: string;
  role?: string;
  usageCriteria?: string;
  version?: string;
  labels: string[];
  createdAt: number;
  updatedAt: number;
  record: SyncRecord;
}

export function agentIdentity(creatorId: string, id: string): string {
  return `${creatorId}:${id}`;
}

export function parseAgentProfile(record: SyncRecord): AgentProfile {
  const id = recordIdentity(record);

  return {
    id,
    identity: agentIdentity(record.creator, id),
    creatorId: record.creator,
    displayName: nonEmptyTagValue(record, "title") ?? DEFAULT_AGENT_NAME,
    instructionsMarkdown: record.content,
    description: nonEmptyTagValue(record, "description"),
    role: nonEmptyTagValue(record, "role"),
    usageCriteria: nonEmptyTagValue(record, "use-criteria"),
    version: nonEmptyTagValue(record, "ver"),
    labels: tagValues(record, "t"),
    createdAt: record.createdAt,
    updatedAt: record.createdAt,
    record,
  };
}

/**
 * Mention tag addressing this agent.
 */
export function agentMentionTag(agent: AgentProfile): string[] {
  return ["p", agent.id];
}

export function mergeAgentProfile(
  stored: AgentProfile,
  incoming: AgentProfile
): AgentProfile {
  const next = incoming.record;
  const labels = tagValues(next, "t");

  return {
    ...stored,
    displayName: nonEmptyTagValue(next, "title") ?? stored.displayName,
    instructionsMarkdown:
      next.content !== "" ? next.content : stored.instructionsMarkdown,
    description: nonEmptyTagValue(next, "description") ?? stored.description,
    role: nonEmptyTagValue(next, "role") ?? stored.role,
    usageCriteria: nonEmptyTagValue(next, "use-criteria") ?? stored.usageCriteria,
    version: nonEmptyTagValue(next, "ver") ?? stored.version,
    labels: labels.length > 0 ? labels : stored.labels,
    updatedAt: incoming.updatedAt,
    record: next,
  };
}

export const agentProfilePolicy: MergePolicy<AgentProfile> = {
  versionOf: (agent) => agent.updatedAt,
  merge: mergeAgentProfile,
};
