/**
 * Record kinds used by the agent workspace.
 */
export const RecordKind = {
  // Conversations
  chat: 11,
  threadReply: 1111,

  // Core entities
  task: 1934,
  project: 31933,

  // Agents
  agentConfig: 4199,
  agentLesson: 4129,
  mcpTool: 4200,

  // Ephemeral status (24xxx)
  projectStatus: 24010,
  llmConfigChange: 24020,
  typingIndicator: 24111,
  typingIndicatorStop: 24112,
  taskAbort: 24133,
} as const;

export type RecordKindName = keyof typeof RecordKind;

const EPHEMERAL_MIN = 20000;
const EPHEMERAL_MAX = 30000;

/**
 * Ephemeral kinds are presence signals; transports are not expected to keep them.
 */
export function isEphemeralKind(kind: number): boolean {
  return kind >= EPHEMERAL_MIN && kind < EPHEMERAL_MAX;
}

