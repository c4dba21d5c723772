export {
  SubscriptionOrchestrator,
  type ChildWatchGroup,
  type ChildWatchSpec,
  type OrchestratorOptions,
  type RecordHandler,
  type SubscriptionInfo,
  type WatchHandle,
  type WatchOptions,
  type WatchStatus,
} from "./orchestrator.js";
