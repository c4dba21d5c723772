/**
 * Tests for strata_projects - project overview tool
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  MemoryTransport,
  buildProject,
  buildProjectStatus,
  createIdentitySigner,
  createSyncSession,
  type SyncSession,
} from "@strata/core";
import { projectsHandler } from "./strata-projects.js";

const signer = createIdentitySigner("pk1");
const ALPHA = "31933:pk1:alpha";
const BETA = "31933:pk1:beta";

describe("strata_projects", () => {
  let transport: MemoryTransport;
  let session: SyncSession;

  beforeEach(async () => {
    transport = new MemoryTransport();
    session = createSyncSession({ transport, signer });
    transport.deliver(await signer.sign(buildProject({ slug: "beta", title: "Beta" }, 100)));
    transport.deliver(await signer.sign(buildProject({ slug: "alpha", title: "Alpha" }, 100)));
    session.ingest(
      await signer.sign(
        buildProjectStatus({ projectIdentity: ALPHA, agents: [{ agentId: "ag1", slug: "planner" }] }, 1000)
      )
    );
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("lists projects with online state", async () => {
    const result = await projectsHandler(session, {}, 1_050_000);

    expect(result.structuredContent.success).toBe(true);
    expect(result.structuredContent.stale).toBe(false);
    expect(result.structuredContent.projects).toEqual([
      {
        identity: ALPHA,
        slug: "alpha",
        title: "Alpha",
        description: undefined,
        online: true,
        agents: ["planner"],
        lastStatusAt: 1000,
      },
      {
        identity: BETA,
        slug: "beta",
        title: "Beta",
        description: undefined,
        online: false,
        agents: [],
        lastStatusAt: undefined,
      },
    ]);
    expect(result.content[0].text).toBe(
      `2 projects, 1 online\n- Alpha (${ALPHA}) online: planner\n- Beta (${BETA}) offline`
    );
  });

  it("treats a stale status as offline", async () => {
    const result = await projectsHandler(session, {}, 1_120_000);

    expect(result.structuredContent.projects.every((p) => !p.online)).toBe(true);
    expect(result.structuredContent.projects[0].lastStatusAt).toBe(1000);
  });

  it("filters to online projects", async () => {
    const result = await projectsHandler(session, { onlineOnly: true }, 1_050_000);

    expect(result.structuredContent.projects.map((p) => p.identity)).toEqual([ALPHA]);
    expect(result.structuredContent.count).toBe(1);
  });

  it("serves cached projects when the transport is down", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    await projectsHandler(session, {}, 1_050_000);
    transport.setOutage(new Error("offline"));

    const result = await projectsHandler(session, {}, 1_050_000);

    expect(result.structuredContent.success).toBe(true);
    expect(result.structuredContent.stale).toBe(true);
    expect(result.structuredContent.count).toBe(2);
    expect(result.content[0].text.split("\n")[0]).toBe("2 projects, 1 online (cached)");
  });
});
