export {
  EntityStore,
  type MergePolicy,
  type UpsertResult,
  type EntityChange,
  type ChangeListener,
} from "./entity-store.js";
