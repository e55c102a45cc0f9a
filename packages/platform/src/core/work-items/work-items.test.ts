/**
 * Work Item Service — Test Suite
 *
 *   - create starts in the initial status and audits ItemCreated
 *   - create refuses unknown projects and statuses
 *   - archive is idempotent and freezes the item
 *   - history renders the audit trail oldest first
 *   - comments are appended, audited, published and listed oldest first
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  InvalidTransitionError,
  ItemArchivedError,
  NotFoundError,
  PersistenceError,
} from "../errors/index.js";
import { createHarness, PROJECT, TENANT_A, TENANT_B, type Harness } from "../test-fixtures.js";

let h: Harness;

beforeEach(async () => {
  h = await createHarness();
});

describe("create", () => {
  it("starts in the initial status, owned by the caller", async () => {
    const item = await h.core.workItems.create(await h.as("alice"), {
      projectId: PROJECT,
      title: "Conference hotel",
      key: "EXP-7",
    });

    expect(item).toMatchObject({
      tenantId: TENANT_A,
      projectId: PROJECT,
      key: "EXP-7",
      title: "Conference hotel",
      status: "draft",
      ownerId: "alice",
      ownerType: "user",
      archived: false,
    });
    expect(await h.item(item.id)).toEqual(item);
    expect(h.events).toEqual([
      {
        type: "workItem.created",
        payload: { tenantId: TENANT_A, workItemId: item.id, projectId: PROJECT, status: "draft" },
      },
    ]);

    const { data } = await h.store.reader(TENANT_A).listAudit({ workItemId: item.id });
    expect(data.map((e) => e.action)).toEqual(["ItemCreated"]);
  });

  it("accepts an explicit status from the workflow", async () => {
    const item = await h.core.workItems.create(await h.as("alice"), {
      projectId: PROJECT,
      title: "Imported claim",
      status: "submitted",
    });
    expect(item.status).toBe("submitted");
  });

  it("refuses a status outside the workflow", async () => {
    await expect(
      h.core.workItems.create(await h.as("alice"), {
        projectId: PROJECT,
        title: "Bad",
        status: "paid",
      })
    ).rejects.toBeInstanceOf(InvalidTransitionError);
    expect(await h.core.workItems.list(await h.as("alice"))).toEqual([]);
  });

  it("refuses a project without a workflow", async () => {
    await expect(
      h.core.workItems.create(await h.as("alice"), { projectId: "hiring", title: "Offer" })
    ).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe("archive", () => {
  it("archives once and then blocks changes", async () => {
    const item = await h.seedItem({ status: "in_review" });
    const mia = await h.as("mia");

    const archived = await h.core.workItems.archive(mia, item.id);
    const again = await h.core.workItems.archive(mia, item.id);

    expect(archived.archived).toBe(true);
    expect(again).toEqual(archived);
    expect(h.events.map((e) => e.type)).toEqual(["workItem.archived"]);

    await expect(
      h.core.approvals.assign(mia, { itemId: item.id, reviewerId: "bob" })
    ).rejects.toBeInstanceOf(ItemArchivedError);
  });

  it("hides archived items from lists unless asked", async () => {
    const kept = await h.seedItem();
    const gone = await h.seedItem();
    const mia = await h.as("mia");
    await h.core.workItems.archive(mia, gone.id);

    expect((await h.core.workItems.list(mia)).map((i) => i.id)).toEqual([kept.id]);
    expect(
      (await h.core.workItems.list(mia, { includeArchived: true })).map((i) => i.id)
    ).toEqual([kept.id, gone.id]);
  });
});

describe("history", () => {
  it("describes each recorded step, oldest first", async () => {
    const alice = await h.as("alice");
    const item = await h.core.workItems.create(alice, { projectId: PROJECT, title: "Taxi" });
    await h.core.approvals.moveItem(alice, { itemId: item.id, targetStatus: "submitted" });
    await h.core.approvals.moveItem(alice, { itemId: item.id, targetStatus: "in_review" });
    await h.core.approvals.assign(await h.as("mia"), { itemId: item.id, reviewerId: "bob" });
    await h.core.approvals.recordDecision(await h.as("bob"), {
      itemId: item.id,
      decision: "approved",
    });

    const timeline = await h.core.workItems.history(alice, item.id);

    expect(timeline.map((e) => e.summary)).toEqual([
      'Created in "draft"',
      'Moved from "draft" to "submitted"',
      'Moved from "submitted" to "in_review"',
      "Reviewer bob assigned",
      "bob approved",
      'Moved from "in_review" to "approved" by review outcome',
    ]);
  });
});

describe("comments", () => {
  it("appends a comment with an audit entry and an event", async () => {
    const item = await h.seedItem({ status: "in_review" });

    const comment = await h.core.workItems.addComment(await h.as("carol"), {
      itemId: item.id,
      content: "Which cost centre?",
    });

    expect(comment).toMatchObject({
      tenantId: TENANT_A,
      workItemId: item.id,
      authorId: "carol",
      content: "Which cost centre?",
    });
    expect(h.events).toEqual([
      {
        type: "workItem.comment_added",
        payload: { tenantId: TENANT_A, workItemId: item.id, commentId: comment.id, authorId: "carol" },
      },
    ]);

    const { data } = await h.store.reader(TENANT_A).listAudit({ workItemId: item.id });
    expect(data).toHaveLength(1);
    expect(data[0]).toMatchObject({
      actorId: "carol",
      action: "CommentAdded",
      entityType: "Comment",
      entityId: comment.id,
      newValue: "Which cost centre?",
    });
  });

  it("keeps only the start of a long comment in the audit entry", async () => {
    const item = await h.seedItem();
    const content = "x".repeat(150);

    const comment = await h.core.workItems.addComment(await h.as("alice"), { itemId: item.id, content });

    expect(comment.content).toHaveLength(150);
    const { data } = await h.store.reader(TENANT_A).listAudit({ action: "CommentAdded" });
    expect(data[0]?.newValue).toBe("x".repeat(100));
  });

  it("lists comments oldest first and leaves the status alone", async () => {
    const item = await h.seedItem({ status: "submitted" });
    await h.core.workItems.addComment(await h.as("alice"), { itemId: item.id, content: "First" });
    await h.core.workItems.addComment(await h.as("bob"), { itemId: item.id, content: "Second" });

    const comments = await h.core.workItems.listComments(await h.as("vic"), item.id);

    expect(comments.map((c) => [c.authorId, c.content])).toEqual([
      ["alice", "First"],
      ["bob", "Second"],
    ]);
    expect((await h.item(item.id))?.status).toBe("submitted");
  });

  it("refuses comments on archived items", async () => {
    const item = await h.seedItem({
      archived: true,
      archivedAt: new Date("2026-03-01T00:00:00Z"),
    });

    await expect(
      h.core.workItems.addComment(await h.as("alice"), { itemId: item.id, content: "Too late" })
    ).rejects.toBeInstanceOf(ItemArchivedError);
    expect(await h.core.workItems.listComments(await h.as("alice"), item.id)).toEqual([]);
    expect(h.events).toEqual([]);
  });

  it("keeps nothing when the audit write fails", async () => {
    const item = await h.seedItem();
    h.store.failOn("appendAudit");

    await expect(
      h.core.workItems.addComment(await h.as("alice"), { itemId: item.id, content: "Lost" })
    ).rejects.toBeInstanceOf(PersistenceError);
    expect(await h.core.workItems.listComments(await h.as("alice"), item.id)).toEqual([]);
  });

  it("does not reveal another tenant's item", async () => {
    const item = await h.seedItem();
    const tom = await h.as("tom", TENANT_B);

    await expect(h.core.workItems.listComments(tom, item.id)).rejects.toBeInstanceOf(NotFoundError);
    await expect(
      h.core.workItems.addComment(tom, { itemId: item.id, content: "Hello" })
    ).rejects.toBeInstanceOf(NotFoundError);
  });
});
