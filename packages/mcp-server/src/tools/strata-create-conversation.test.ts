/**
 * Tests for strata_create_conversation
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  MemoryTransport,
  createIdentitySigner,
  createSyncSession,
  type SyncSession,
} from "@strata/core";
import { createConversationHandler } from "./strata-create-conversation.js";

const ALPHA = "31933:pk1:alpha";

describe("strata_create_conversation", () => {
  let transport: MemoryTransport;
  let session: SyncSession;

  beforeEach(() => {
    transport = new MemoryTransport();
    session = createSyncSession({ transport, signer: createIdentitySigner("pk1") });
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("publishes a conversation with mentions", async () => {
    const result = await createConversationHandler(session, {
      projectIdentity: ALPHA,
      content: "Can someone review the release branch?",
      title: "Release review",
      mentionAgentIds: ["ag1"],
    });

    const [record] = transport.published;
    expect(result.structuredContent).toEqual({
      success: true,
      conversation: { id: record.id, title: "Release review", createdAt: record.createdAt },
    });
    expect(result.content[0].text).toBe(`Started "Release review" [${record.id}]`);
    expect(record.tags).toContainEqual(["p", "ag1"]);
    expect(session.projectConversations(ALPHA).map((c) => c.id)).toEqual([record.id]);
  });

  it("requires content", async () => {
    const result = await createConversationHandler(session, { projectIdentity: ALPHA, content: "  " });

    expect(result.structuredContent).toEqual({ success: false, error: "Content is required" });
    expect(transport.published).toHaveLength(0);
  });

  it("reports invalid input", async () => {
    const result = await createConversationHandler(session, { projectIdentity: "", content: "hi" });

    expect(result.structuredContent.success).toBe(false);
    expect(result.structuredContent.error).toMatch(/^Invalid input: projectIdentity /);
  });

  it("reports a missing signer", async () => {
    const readOnly = createSyncSession({ transport, signer: null });

    const result = await createConversationHandler(readOnly, { projectIdentity: ALPHA, content: "hi" });

    expect(result.structuredContent.error).toBe(
      "TRANSPORT_NOT_CONFIGURED: Cannot publish: no transport or signer configured"
    );
  });

  it("reports a failed publish and keeps nothing", async () => {
    transport.failNextPublish(new Error("rejected"));

    const result = await createConversationHandler(session, { projectIdentity: ALPHA, content: "hi" });

    expect(result.structuredContent).toEqual({
      success: false,
      error: "TRANSPORT_UNAVAILABLE: publish failed: rejected",
    });
    expect(result.content[0].text).toBe("Error: TRANSPORT_UNAVAILABLE: publish failed: rejected");
    expect(session.projectConversations(ALPHA)).toEqual([]);
  });
});
