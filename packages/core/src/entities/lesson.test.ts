/**
 * Lesson and reply tests
 */

import { describe, it, expect } from "vitest";
import type { SyncRecord } from "../records/record.js";
import { DEFAULT_LESSON_TITLE, parseLesson } from "./lesson.js";
import { compareReplies, parseReply } from "./reply.js";

function record(kind: number, id: string, tags: string[][], content: string, createdAt = 100): SyncRecord {
  return { id, creator: "ag1", kind, createdAt, content, tags };
}

describe("parseLesson", () => {
  it("reads title and content from JSON", () => {
    const lesson = parseLesson(
      record(
        4129,
        "l1",
        [["a", "31933:pk1:proj1"], ["title", "Tag title"], ["lesson-type", "bugfix"], ["agent-name", "Planner"]],
        JSON.stringify({ title: "Retry flaky calls", content: "Wrap them in a retry" })
      )
    );

    expect(lesson).toMatchObject({
      id: "l1",
      agentId: "ag1",
      projectIdentity: "31933:pk1:proj1",
      title: "Retry flaky calls",
      content: "Wrap them in a retry",
      lessonType: "bugfix",
      agentName: "Planner",
    });
  });

  it("uses the title tag when the JSON has no title", () => {
    const lesson = parseLesson(record(4129, "l1", [["title", "Tag title"]], JSON.stringify({ content: "Body" })));
    expect(lesson.title).toBe("Tag title");
    expect(lesson.content).toBe("Body");
  });

  it("keeps raw text content", () => {
    const lesson = parseLesson(record(4129, "l1", [], "just text"));
    expect(lesson.title).toBe(DEFAULT_LESSON_TITLE);
    expect(lesson.content).toBe("just text");
  });

  it("treats non-object JSON as raw text", () => {
    const lesson = parseLesson(record(4129, "l1", [["title", "T"]], "[1,2]"));
    expect(lesson.title).toBe("T");
    expect(lesson.content).toBe("[1,2]");
  });
});

describe("parseReply", () => {
  it("uses the uppercase root and the lowercase parent", () => {
    const reply = parseReply(
      record(1111, "r1", [["E", "conv-1"], ["e", "r0"], ["p", "ag2"], ["new-phase", "execute"]], "ok")
    );

    expect(reply.rootId).toBe("conv-1");
    expect(reply.parentId).toBe("r0");
    expect(reply.mentionedAgentIds).toEqual(["ag2"]);
    expect(reply.phase).toBe("execute");
    expect(reply.projectIdentity).toBeUndefined();
  });

  it("falls back to the lowercase reference as root", () => {
    const reply = parseReply(record(1111, "r1", [["e", "conv-1"], ["phase", "plan"]], "ok"));
    expect(reply.rootId).toBe("conv-1");
    expect(reply.parentId).toBeUndefined();
    expect(reply.phase).toBe("plan");
  });

  it("orders oldest first with id as tie-breaker", () => {
    const a = parseReply(record(1111, "b", [], "", 100));
    const b = parseReply(record(1111, "a", [], "", 100));
    const c = parseReply(record(1111, "c", [], "", 50));
    expect([a, b, c].sort(compareReplies).map((r) => r.id)).toEqual(["c", "a", "b"]);
  });
});
