/**
 * Records Module
 *
 * Raw transport records, tag lookup and identity helpers.
 */

export {
  TagSchema,
  SyncRecordSchema,
  RecordDraftSchema,
  computeRecordId,
  safeParseRecord,
  nowSeconds,
  type SyncRecord,
  type RecordDraft,
} from "./record.js";

export { RecordKind, isEphemeralKind, type RecordKindName } from "./kinds.js";

export {
  UPDATE_MARKER,
  findTag,
  tagValue,
  nonEmptyTagValue,
  tagValues,
  updateTarget,
  eventReference,
  recordIdentity,
  formatAddress,
  parseAddress,
  splitAddress,
  addressReference,
  type AddressParts,
} from "./tags.js";
