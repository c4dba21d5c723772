/**
 * Agent profile tests
 */

import { describe, it, expect } from "vitest";
import type { SyncRecord } from "../records/record.js";
import { EntityStore } from "../store/entity-store.js";
import {
  DEFAULT_AGENT_NAME,
  agentMentionTag,
  agentProfilePolicy,
  parseAgentProfile,
} from "./agent.js";

function agentRecord(id: string, createdAt: number, tags: string[][], content = ""): SyncRecord {
  return { id, creator: "pk1", kind: 4199, createdAt, content, tags };
}

describe("parseAgentProfile", () => {
  it("reads metadata tags and instructions", () => {
    const agent = parseAgentProfile(
      agentRecord(
        "a1",
        100,
        [
          ["title", "Planner"],
          ["description", "Breaks work down"],
          ["role", "planner"],
          ["use-criteria", "Large tasks"],
          ["ver", "2"],
          ["t", "planning"],
          ["t", "ops"],
        ],
        "# Instructions"
      )
    );

    expect(agent).toMatchObject({
      id: "a1",
      identity: "pk1:a1",
      displayName: "Planner",
      instructionsMarkdown: "# Instructions",
      description: "Breaks work down",
      role: "planner",
      usageCriteria: "Large tasks",
      version: "2",
      labels: ["planning", "ops"],
    });
    expect(agentMentionTag(agent)).toEqual(["p", "a1"]);
  });

  it("defaults the display name", () => {
    expect(parseAgentProfile(agentRecord("a1", 100, [])).displayName).toBe(DEFAULT_AGENT_NAME);
  });

  it("refreshes a profile through an update record", () => {
    const store = new EntityStore(agentProfilePolicy);
    const original = parseAgentProfile(
      agentRecord("a1", 100, [["title", "Planner"], ["role", "planner"]], "Old instructions")
    );
    store.upsert(original.identity, original);

    const update = parseAgentProfile(
      agentRecord("a2", 200, [["e", "a1", "", "update"], ["title", "Lead Planner"]])
    );
    const result = store.upsert(update.identity, update);

    expect(update.identity).toBe("pk1:a1");
    expect(result.entity.displayName).toBe("Lead Planner");
    expect(result.entity.role).toBe("planner");
    expect(result.entity.instructionsMarkdown).toBe("Old instructions");
  });
});
