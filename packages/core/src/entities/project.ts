/**
 * Project entity
 *
 * Addressable: one live project per `kind:creator:slug`. Later records with
 * the same address refresh fields they actually carry.
 */

import type { SyncRecord } from "../records/record.js";
import {
  findTag,
  formatAddress,
  nonEmptyTagValue,
  tagValue,
  tagValues,
} from "../records/tags.js";
import type { MergePolicy } from "../store/entity-store.js";

export interface Project {
  identity: string;
  recordId: string;
  creatorId: string;
  slug: string;
  title: string;
  description?: string;
  repoUrl?: string;
  imageUrl?: string;
  agentIds: string[];
  toolIds: string[];
  hashtags: string[];
  createdAt: number;
  record: SyncRecord;
}

function hashtagsOf(record: SyncRecord): string[] {
  const tag = findTag(record, "hashtags");
  return tag ? tag.slice(1).filter((h) => h !== "") : [];
}

export function parseProject(record: SyncRecord): Project {
  const slug = tagValue(record, "d") ?? "";

  return {
    identity: formatAddress(record.kind, record.creator, slug),
    recordId: record.id,
    creatorId: record.creator,
    slug,
    title: nonEmptyTagValue(record, "title") ?? slug,
    description: record.content === "" ? undefined : record.content,
    repoUrl: nonEmptyTagValue(record, "repo"),
    imageUrl: nonEmptyTagValue(record, "picture"),
    agentIds: tagValues(record, "agent"),
    toolIds: tagValues(record, "mcp"),
    hashtags: hashtagsOf(record),
    createdAt: record.createdAt,
    record,
  };
}

/**
 * Apply a newer project version, keeping fields the newer record leaves out.
 */
export function mergeProject(stored: Project, incoming: Project): Project {
  const next = incoming.record;
  const agentIds = tagValues(next, "agent");
  const toolIds = tagValues(next, "mcp");
  const hashtags = hashtagsOf(next);

  return {
    ...stored,
    recordId: incoming.recordId,
    title: nonEmptyTagValue(next, "title") ?? stored.title,
    description: next.content !== "" ? next.content : stored.description,
    repoUrl: nonEmptyTagValue(next, "repo") ?? stored.repoUrl,
    imageUrl: nonEmptyTagValue(next, "picture") ?? stored.imageUrl,
    agentIds: agentIds.length > 0 ? agentIds : stored.agentIds,
    toolIds: toolIds.length > 0 ? toolIds : stored.toolIds,
    hashtags: hashtags.length > 0 ? hashtags : stored.hashtags,
    createdAt: incoming.createdAt,
    record: next,
  };
}

export const projectPolicy: MergePolicy<Project> = {
  versionOf: (project) => project.createdAt,
  merge: mergeProject,
};
