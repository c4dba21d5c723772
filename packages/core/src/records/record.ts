/**
 * Records
 *
 * Immutable, independently signed events delivered by the transport.
 * Everything the sync layer knows is derived from these.
 */

import { createHash } from "crypto";
import { z } from "zod";

// --- Schema ---

export const TagSchema = z.array(z.string());

export const SyncRecordSchema = z.object({
  id: z.string().min(1),
  creator: z.string().min(1),
  kind: z.number().int().nonnegative(),
  createdAt: z.number().int().nonnegative(), // unix seconds
  content: z.string(),
  tags: z.array(TagSchema),
});

export type SyncRecord = z.infer<typeof SyncRecordSchema>;

/**
 * An unsigned record, as produced by the builders.
 */
export const RecordDraftSchema = SyncRecordSchema.omit({ id: true, creator: true });

export type RecordDraft = z.infer<typeof RecordDraftSchema>;

// --- Helpers ---

export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Derive a record id from its signed fields.
 * Hex SHA-256 of `[0, creator, createdAt, kind, tags, content]`.
 */
export function computeRecordId(creator: string, draft: RecordDraft): string {
  const serialized = JSON.stringify([
    0,
    creator,
    draft.createdAt,
    draft.kind,
    draft.tags,
    draft.content,
  ]);
  return createHash("sha256").update(serialized).digest("hex");
}

/**
 * Validate an untrusted value as a record. Returns null when invalid.
 */
export function safeParseRecord(value: unknown): SyncRecord | null {
  const parsed = SyncRecordSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}
