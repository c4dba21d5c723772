/**
 * Conversation entity tests
 */

import { describe, it, expect } from "vitest";
import type { SyncRecord } from "../records/record.js";
import { EntityStore } from "../store/entity-store.js";
import {
  conversationDisplayTitle,
  conversationPolicy,
  parseConversation,
} from "./conversation.js";

function chatRecord(id: string, createdAt: number, tags: string[][], content = ""): SyncRecord {
  return { id, creator: "pk1", kind: 11, createdAt, content, tags };
}

describe("parseConversation", () => {
  it("reads project, title and mentions", () => {
    const conversation = parseConversation(
      chatRecord(
        "c1",
        100,
        [["a", "31933:pk1:proj1"], ["title", "Planning"], ["p", "ag1"]],
        "Let's plan"
      )
    );

    expect(conversation).toMatchObject({
      id: "c1",
      projectIdentity: "31933:pk1:proj1",
      title: "Planning",
      content: "Let's plan",
      mentionedAgentIds: ["ag1"],
    });
  });
});

describe("conversationDisplayTitle", () => {
  it("prefers the title, then the first content line", () => {
    expect(conversationDisplayTitle(parseConversation(chatRecord("c1", 1, [["title", "T"]], "x")))).toBe("T");
    expect(conversationDisplayTitle(parseConversation(chatRecord("c1", 1, [], "  first \nsecond")))).toBe(
      "first"
    );
    expect(conversationDisplayTitle(parseConversation(chatRecord("c1", 1, [], "")))).toBe("Untitled");
  });
});

describe("conversation merge", () => {
  it("backfills a missing title from an update record", () => {
    const store = new EntityStore(conversationPolicy);
    const original = parseConversation(chatRecord("c1", 100, [["a", "31933:pk1:proj1"]], "Hello"));
    store.upsert(original.id, original);

    const update = parseConversation(
      chatRecord("u1", 200, [["e", "c1", "", "update"], ["title", "Greeting"]])
    );
    const result = store.upsert(update.id, update);

    expect(result.changed).toBe(true);
    expect(result.entity.title).toBe("Greeting");
    expect(result.entity.content).toBe("Hello");
    expect(result.entity.createdAt).toBe(100);
  });

  it("ignores newer records without a title", () => {
    const store = new EntityStore(conversationPolicy);
    const original = parseConversation(chatRecord("c1", 100, [["title", "Kept"]], "Hello"));
    store.upsert(original.id, original);

    const update = parseConversation(chatRecord("u1", 200, [["e", "c1", "", "update"]]));
    expect(store.upsert(update.id, update).changed).toBe(false);
    expect(store.get("c1")?.title).toBe("Kept");
  });
});
