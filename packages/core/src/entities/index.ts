/**
 * Entities Module
 *
 * Total parsers from records to typed entities, with their merge policies.
 */

export {
  parseProject,
  mergeProject,
  projectPolicy,
  type Project,
} from "./project.js";

export {
  parseConversation,
  mergeConversation,
  conversationDisplayTitle,
  conversationPolicy,
  type Conversation,
} from "./conversation.js";

export {
  DEFAULT_TASK_TITLE,
  parseTask,
  mergeTask,
  isAssignedTo,
  taskPolicy,
  type Task,
} from "./task.js";

export {
  DEFAULT_AGENT_NAME,
  agentIdentity,
  agentMentionTag,
  parseAgentProfile,
  mergeAgentProfile,
  agentProfilePolicy,
  type AgentProfile,
} from "./agent.js";

export {
  TYPING_VALIDITY_SECONDS,
  LLMConfigPayloadSchema,
  parseProjectStatus,
  projectStatusPolicy,
  parseTypingSignal,
  isTypingSignalValid,
  typingSignalPolicy,
  parseTaskAbort,
  parseLLMConfigChange,
  llmConfigPolicy,
  type AgentAvailability,
  type ProjectStatus,
  type TypingSignal,
  type TaskAbortSignal,
  type LLMConfigPayload,
  type LLMConfigChange,
} from "./status.js";

export {
  DEFAULT_LESSON_TITLE,
  LessonContentSchema,
  parseLesson,
  lessonPolicy,
  type Lesson,
  type LessonContent,
} from "./lesson.js";

export {
  parseReply,
  phaseOf,
  compareReplies,
  replyPolicy,
  type Reply,
} from "./reply.js";

export { decodeJson } from "./json.js";
