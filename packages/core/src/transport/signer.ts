/**
 * Identity signer
 *
 * Stamps drafts with the configured creator and a content-derived id.
 * Cryptographic signatures belong to the transport's client and are not
 * produced here.
 */

import { computeRecordId, type RecordDraft, type SyncRecord } from "../records/record.js";
import type { Signer } from "./types.js";

export function createIdentitySigner(creator: string): Signer {
  return {
    creator,
    sign: async (draft: RecordDraft): Promise<SyncRecord> => ({
      id: computeRecordId(creator, draft),
      creator,
      kind: draft.kind,
      createdAt: draft.createdAt,
      content: draft.content,
      tags: draft.tags.map((tag) => [...tag]),
    }),
  };
}
