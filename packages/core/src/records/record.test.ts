/**
 * Record tests
 */

import { describe, it, expect } from "vitest";
import { computeRecordId, safeParseRecord, type RecordDraft } from "./record.js";
import { isEphemeralKind, RecordKind } from "./kinds.js";

const draft: RecordDraft = {
  kind: 11,
  content: "hello",
  createdAt: 1700000000,
  tags: [["a", "31933:pk1:proj1"]],
};

describe("computeRecordId", () => {
  it("is a 64-character hex digest", () => {
    expect(computeRecordId("pk1", draft)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("is stable for the same input", () => {
    expect(computeRecordId("pk1", draft)).toBe(computeRecordId("pk1", { ...draft }));
  });

  it("changes with the creator and the content", () => {
    const base = computeRecordId("pk1", draft);
    expect(computeRecordId("pk2", draft)).not.toBe(base);
    expect(computeRecordId("pk1", { ...draft, content: "bye" })).not.toBe(base);
  });
});

describe("safeParseRecord", () => {
  it("accepts a valid record", () => {
    const value = { id: "r1", creator: "pk1", ...draft };
    expect(safeParseRecord(value)).toEqual(value);
  });

  it("rejects missing fields and bad tags", () => {
    expect(safeParseRecord({ id: "r1", creator: "pk1", kind: 11 })).toBeNull();
    expect(safeParseRecord({ id: "r1", creator: "pk1", ...draft, tags: [[1, 2]] })).toBeNull();
  });
});

describe("isEphemeralKind", () => {
  it("covers the 2xxxx range", () => {
    expect(isEphemeralKind(RecordKind.projectStatus)).toBe(true);
    expect(isEphemeralKind(RecordKind.taskAbort)).toBe(true);
    expect(isEphemeralKind(RecordKind.project)).toBe(false);
    expect(isEphemeralKind(RecordKind.chat)).toBe(false);
  });
});
