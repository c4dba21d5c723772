/**
 * Phase tracker tests
 */

import { describe, it, expect } from "vitest";
import type { SyncRecord } from "../records/record.js";
import { PhaseTracker } from "./phase-tracker.js";

function statusUpdate(id: string, createdAt: number, tags: string[][]): SyncRecord {
  return { id, creator: "ag1", kind: 1111, createdAt, content: "update", tags };
}

describe("PhaseTracker", () => {
  it("keeps the latest phase per conversation", () => {
    const tracker = new PhaseTracker();
    tracker.reduce(statusUpdate("u1", 100, [["E", "conv-1"], ["phase", "plan"]]));
    tracker.reduce(statusUpdate("u2", 200, [["E", "conv-1"], ["new-phase", "execute"]]));
    tracker.reduce(statusUpdate("u3", 150, [["E", "conv-1"], ["phase", "review"]]));

    expect(tracker.current("conv-1")).toBe("execute");
  });

  it("falls back to the lowercase reference", () => {
    const tracker = new PhaseTracker();
    expect(tracker.reduce(statusUpdate("u1", 100, [["e", "conv-2"], ["phase", "chat"]]))).toBe(true);
    expect(tracker.current("conv-2")).toBe("chat");
  });

  it("ignores replies without a phase", () => {
    const tracker = new PhaseTracker();
    expect(tracker.reduce(statusUpdate("u1", 100, [["E", "conv-1"]]))).toBe(false);
    expect(tracker.current("conv-1")).toBeUndefined();
  });
});
