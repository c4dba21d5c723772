/**
 * Presence entities
 *
 * Ephemeral records: project status snapshots, typing indicators,
 * task aborts and LLM configuration changes. None of them are merged
 * field-by-field.
 */

import { z } from "zod";
import type { SyncRecord } from "../records/record.js";
import {
  addressReference,
  nonEmptyTagValue,
  tagValue,
} from "../records/tags.js";
import type { MergePolicy } from "../store/entity-store.js";
import { decodeJson } from "./json.js";

/** Seconds a typing indicator stays valid after it was observed */
export const TYPING_VALIDITY_SECONDS = 60;

// --- Project status ---

export interface AgentAvailability {
  agentId: string;
  slug: string;
  name: string;
}

export interface ProjectStatus {
  projectIdentity: string;
  observedAt: number;
  availableAgents: AgentAvailability[];
  record: SyncRecord;
}

/**
 * Agents come from `["agent", <pubkey>, <slug>]`; shorter groups are skipped.
 */
export function parseProjectStatus(record: SyncRecord): ProjectStatus {
  const availableAgents: AgentAvailability[] = [];
  for (const tag of record.tags) {
    if (tag[0] !== "agent" || tag.length < 3) continue;
    availableAgents.push({ agentId: tag[1], slug: tag[2], name: tag[2] });
  }

  return {
    projectIdentity: addressReference(record),
    observedAt: record.createdAt,
    availableAgents,
    record,
  };
}

/** A status snapshot replaces the previous one wholesale. */
export const projectStatusPolicy: MergePolicy<ProjectStatus> = {
  versionOf: (status) => status.observedAt,
  merge: (_stored, incoming) => incoming,
};

// --- Typing indicator ---

export interface TypingSignal {
  conversationId: string;
  projectIdentity: string;
  creatorId: string;
  message: string;
  observedAt: number;
  phase?: string;
  record: SyncRecord;
}

export function parseTypingSignal(record: SyncRecord): TypingSignal {
  return {
    conversationId: tagValue(record, "e") ?? "",
    projectIdentity: addressReference(record),
    creatorId: record.creator,
    message: record.content,
    observedAt: record.createdAt,
    phase: nonEmptyTagValue(record, "phase"),
    record,
  };
}

/**
 * Valid while fewer than 60 seconds have passed since it was observed.
 * Evaluated against the clock on every call.
 */
export function isTypingSignalValid(
  signal: Pick<TypingSignal, "observedAt">,
  nowMs: number = Date.now()
): boolean {
  return nowMs / 1000 - signal.observedAt < TYPING_VALIDITY_SECONDS;
}

export const typingSignalPolicy: MergePolicy<TypingSignal> = {
  versionOf: (signal) => signal.observedAt,
  merge: (_stored, incoming) => incoming,
};

// --- Task abort ---

export interface TaskAbortSignal {
  taskId: string;
  recordId: string;
  creatorId: string;
  observedAt: number;
}

export function parseTaskAbort(record: SyncRecord): TaskAbortSignal {
  return {
    taskId: tagValue(record, "e") ?? "",
    recordId: record.id,
    creatorId: record.creator,
    observedAt: record.createdAt,
  };
}

// --- LLM config change ---

export const LLMConfigPayloadSchema = z.object({
  model: z.string().optional(),
  temperature: z.number().optional(),
  maxTokens: z.number().int().optional(),
  provider: z.string().optional(),
});

export type LLMConfigPayload = z.infer<typeof LLMConfigPayloadSchema>;

export interface LLMConfigChange extends LLMConfigPayload {
  projectIdentity: string;
  observedAt: number;
}

/**
 * Non-JSON content, or JSON of the wrong shape, yields an empty config.
 */
export function parseLLMConfigChange(record: SyncRecord): LLMConfigChange {
  const parsed = LLMConfigPayloadSchema.safeParse(decodeJson(record.content));
  const payload = parsed.success ? parsed.data : {};

  return {
    ...payload,
    projectIdentity: addressReference(record),
    observedAt: record.createdAt,
  };
}

/** Latest change per project wins. */
export const llmConfigPolicy: MergePolicy<LLMConfigChange> = {
  versionOf: (change) => change.observedAt,
  merge: (_stored, incoming) => incoming,
};
