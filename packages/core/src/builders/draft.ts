import { nowSeconds, type RecordDraft } from "../records/record.js";

export type Tag = string[];

/**
 * Assemble a draft, dropping optional tags whose value is absent or empty.
 */
export function draft(
  kind: number,
  content: string,
  tags: Array<Tag | null>,
  createdAt: number = nowSeconds()
): RecordDraft {
  return {
    kind,
    content,
    createdAt,
    tags: tags.filter((tag): tag is Tag => tag !== null),
  };
}

/** `[key, value]`, or null when the value is missing */
export function optionalTag(key: string, value: string | undefined): Tag | null {
  return value ? [key, value] : null;
}

export function repeatedTags(key: string, values: readonly string[]): Tag[] {
  return values.filter((v) => v !== "").map((v) => [key, v]);
}
