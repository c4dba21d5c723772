export {
  DEFAULT_STATUS_FRESHNESS_SECONDS,
  ProjectStatusReducer,
  type ProjectStatusReducerOptions,
} from "./project-status.js";
export { TypingReducer, typingKey } from "./typing.js";
export { TaskAbortInbox, type AbortHandler } from "./task-abort.js";
export { PhaseTracker, type ConversationPhase } from "./phase-tracker.js";
