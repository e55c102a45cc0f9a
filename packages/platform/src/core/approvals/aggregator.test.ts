/**
 * Approval Aggregator — Test Suite
 *
 *   - the last approval moves the item to the approved status, once
 *   - a rejection moves it to the rework status and resets the others
 *   - decisions are refused outside reviewable statuses and from non-reviewers
 *   - a reviewer decides once per round
 *   - concurrent decisions produce exactly one automatic transition
 *   - assign / unassign are idempotent; unassign re-evaluates the outcome
 *   - re-entering review opens a fresh round
 *   - a failed write leaves decision and status unchanged
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  AlreadyDecidedError,
  ItemArchivedError,
  NotFoundError,
  NotInReviewableStateError,
  PersistenceError,
  UnknownReviewerError,
} from "../errors/index.js";
import { createHarness, TENANT_A, type Harness } from "../test-fixtures.js";

let h: Harness;

beforeEach(async () => {
  h = await createHarness();
});

async function decide(userId: string, itemId: string, decision: "approved" | "rejected", note?: string) {
  return h.core.approvals.recordDecision(await h.as(userId), { itemId, decision, note });
}

async function states(itemId: string): Promise<Record<string, string>> {
  const assignments = await h.store.reader(TENANT_A).listAssignments(itemId);
  return Object.fromEntries(assignments.map((a) => [a.reviewerId, a.state]));
}

async function statusChanges(itemId: string) {
  const { data } = await h.store
    .reader(TENANT_A)
    .listAudit({ workItemId: itemId, action: "StatusChange" });
  return data;
}

// ---------------------------------------------------------------------------
// Unanimous approval
// ---------------------------------------------------------------------------

describe("recordDecision — approval", () => {
  it("stays in review until the last reviewer approves", async () => {
    const item = await h.seedItem({ status: "in_review" });
    await h.seedReviewers(item.id, ["bob", "carol", "dave"]);

    const first = await decide("bob", item.id, "approved");
    expect(first.aggregate).toBe("PendingReview");
    expect(first.autoTransition).toBeNull();

    const second = await decide("carol", item.id, "approved");
    expect(second.aggregate).toBe("PendingReview");
    expect((await h.item(item.id))?.status).toBe("in_review");

    const third = await decide("dave", item.id, "approved");
    expect(third.aggregate).toBe("FullyApproved");
    expect(third.autoTransition).toEqual({ from: "in_review", to: "approved" });
    expect(third.item.status).toBe("approved");
    expect(third.item.milestones.approved).toEqual(third.item.updatedAt);

    const changes = await statusChanges(item.id);
    expect(changes).toHaveLength(1);
    expect(changes[0]).toMatchObject({
      actorId: "dave",
      previousValue: "in_review",
      newValue: "approved",
      metadata: { origin: "approval" },
    });
  });

  it("publishes the decision before the status change it caused", async () => {
    const item = await h.seedItem({ status: "in_review" });
    await h.seedReviewers(item.id, ["bob"]);

    await decide("bob", item.id, "approved", "Looks right");

    expect(h.events.map((e) => e.type)).toEqual([
      "workItem.reviewer_decision_recorded",
      "workItem.status_changed",
    ]);
    expect(h.events[0]?.payload).toEqual({
      tenantId: TENANT_A,
      workItemId: item.id,
      reviewerId: "bob",
      decision: "approved",
      note: "Looks right",
    });
  });

  it("refuses a second decision from a reviewer who already approved", async () => {
    const item = await h.seedItem({ status: "in_review" });
    await h.seedReviewers(item.id, ["bob", "carol"]);
    await decide("bob", item.id, "approved");
    h.events.length = 0;

    const error = await decide("bob", item.id, "rejected").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AlreadyDecidedError);
    expect(error).toMatchObject({ kind: "already_decided", decision: "approved" });
    expect(await states(item.id)).toEqual({ bob: "approved", carol: "pending" });
    expect((await h.item(item.id))?.status).toBe("in_review");
    expect(h.events).toEqual([]);
  });

  it("refuses repeating the same decision", async () => {
    const item = await h.seedItem({ status: "in_review" });
    await h.seedReviewers(item.id, ["bob", "carol"]);
    await decide("bob", item.id, "approved");

    await expect(decide("bob", item.id, "approved")).rejects.toBeInstanceOf(AlreadyDecidedError);
    const { data } = await h.store
      .reader(TENANT_A)
      .listAudit({ workItemId: item.id, action: "ReviewerApproved" });
    expect(data).toHaveLength(1);
  });
});

// ---------------------------------------------------------------------------
// Rejection
// ---------------------------------------------------------------------------

describe("recordDecision — rejection", () => {
  it("moves to the rework status and resets the other reviewers", async () => {
    const item = await h.seedItem({ status: "in_review" });
    await h.seedReviewers(item.id, ["bob", "carol", "dave"]);

    await decide("bob", item.id, "approved");
    await decide("carol", item.id, "approved");
    const outcome = await decide("dave", item.id, "rejected", "Receipts missing");

    expect(outcome.aggregate).toBe("Rejected");
    expect(outcome.autoTransition).toEqual({ from: "in_review", to: "rejected" });
    expect((await h.item(item.id))?.status).toBe("rejected");
    expect(await states(item.id)).toEqual({ bob: "pending", carol: "pending", dave: "rejected" });

    const { data } = await h.store
      .reader(TENANT_A)
      .listAudit({ workItemId: item.id, action: "ReviewerReset" });
    expect(data.map((e) => e.metadata.reviewerId).sort()).toEqual(["bob", "carol"]);
  });

  it("is dominant regardless of order", async () => {
    const item = await h.seedItem({ status: "in_review" });
    await h.seedReviewers(item.id, ["bob", "carol"]);

    const outcome = await decide("bob", item.id, "rejected");

    expect(outcome.aggregate).toBe("Rejected");
    expect((await h.item(item.id))?.status).toBe("rejected");
    expect(await states(item.id)).toEqual({ bob: "rejected", carol: "pending" });
  });
});

// ---------------------------------------------------------------------------
// Refusals
// ---------------------------------------------------------------------------

describe("recordDecision — refusals", () => {
  it("refuses a caller without an assignment", async () => {
    const item = await h.seedItem({ status: "in_review" });
    await h.seedReviewers(item.id, ["bob"]);

    await expect(decide("carol", item.id, "approved")).rejects.toBeInstanceOf(UnknownReviewerError);
    expect(await states(item.id)).toEqual({ bob: "pending" });
  });

  it("refuses decisions outside a reviewable status", async () => {
    const item = await h.seedItem({ status: "draft" });
    await h.seedReviewers(item.id, ["bob"]);

    await expect(decide("bob", item.id, "approved")).rejects.toBeInstanceOf(
      NotInReviewableStateError
    );
    expect(await states(item.id)).toEqual({ bob: "pending" });
    expect((await h.item(item.id))?.status).toBe("draft");
  });

  it("refuses decisions on archived items before anything else", async () => {
    const item = await h.seedItem({
      status: "draft",
      archived: true,
      archivedAt: new Date("2026-03-01T00:00:00Z"),
    });

    await expect(decide("carol", item.id, "approved")).rejects.toBeInstanceOf(ItemArchivedError);
  });

  it("keeps the decision unrecorded when the automatic move fails to persist", async () => {
    const item = await h.seedItem({ status: "in_review" });
    await h.seedReviewers(item.id, ["bob"]);
    h.store.failOn("updateItem");

    await expect(decide("bob", item.id, "approved")).rejects.toBeInstanceOf(PersistenceError);
    expect(await states(item.id)).toEqual({ bob: "pending" });
    expect((await h.item(item.id))?.status).toBe("in_review");
    expect(h.events).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Concurrency
// ---------------------------------------------------------------------------

describe("recordDecision — concurrency", () => {
  it("moves the item exactly once when the last reviewers decide together", async () => {
    const item = await h.seedItem({ status: "in_review" });
    await h.seedReviewers(item.id, ["bob", "carol", "dave"]);
    await decide("bob", item.id, "approved");

    const outcomes = await Promise.all([
      decide("carol", item.id, "approved"),
      decide("dave", item.id, "approved"),
    ]);

    expect(outcomes.filter((o) => o.autoTransition !== null)).toHaveLength(1);
    expect(await statusChanges(item.id)).toHaveLength(1);
    expect((await h.item(item.id))?.status).toBe("approved");
  });
});

// ---------------------------------------------------------------------------
// Assignment
// ---------------------------------------------------------------------------

describe("assign / unassign", () => {
  it("appends reviewers in order and returns an existing assignment unchanged", async () => {
    const item = await h.seedItem({ status: "in_review" });
    const mia = await h.as("mia");

    const bob = await h.core.approvals.assign(mia, { itemId: item.id, reviewerId: "bob" });
    const carol = await h.core.approvals.assign(mia, { itemId: item.id, reviewerId: "carol" });
    await decide("bob", item.id, "approved");
    const again = await h.core.approvals.assign(mia, { itemId: item.id, reviewerId: "bob" });

    expect([bob.created, carol.created, again.created]).toEqual([true, true, false]);
    expect([bob.assignment.order, carol.assignment.order]).toEqual([1, 2]);
    expect(again.assignment.state).toBe("approved");
  });

  it("refuses reviewers outside the tenant", async () => {
    const item = await h.seedItem({ status: "in_review" });

    await expect(
      h.core.approvals.assign(await h.as("mia"), { itemId: item.id, reviewerId: "tom" })
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it("re-evaluates the outcome when a pending reviewer is removed", async () => {
    const item = await h.seedItem({ status: "in_review" });
    await h.seedReviewers(item.id, ["bob", "carol"]);
    await decide("bob", item.id, "approved");

    const outcome = await h.core.approvals.unassign(await h.as("mia"), {
      itemId: item.id,
      reviewerId: "carol",
    });

    expect(outcome).toMatchObject({
      removed: true,
      aggregate: "FullyApproved",
      autoTransition: { from: "in_review", to: "approved" },
    });
    expect((await h.item(item.id))?.status).toBe("approved");
  });

  it("drops a removed reviewer's approval from the count", async () => {
    const item = await h.seedItem({ status: "in_review" });
    await h.seedReviewers(item.id, ["bob", "carol"]);
    await decide("bob", item.id, "approved");

    const outcome = await h.core.approvals.unassign(await h.as("mia"), {
      itemId: item.id,
      reviewerId: "bob",
    });

    expect(outcome).toMatchObject({ removed: true, aggregate: "PendingReview", autoTransition: null });
    expect(await h.core.approvals.getApprovalCount(await h.as("vic"), item.id)).toEqual({
      approved: 0,
      total: 1,
    });
    expect((await h.item(item.id))?.status).toBe("in_review");
  });

  it("does nothing for a reviewer who is not assigned", async () => {
    const item = await h.seedItem({ status: "in_review" });
    await h.seedReviewers(item.id, ["bob"]);

    const outcome = await h.core.approvals.unassign(await h.as("mia"), {
      itemId: item.id,
      reviewerId: "carol",
    });

    expect(outcome).toMatchObject({ removed: false, aggregate: "PendingReview", autoTransition: null });
    expect(h.events).toEqual([]);
  });

  it("leaves status alone when the item is not in review", async () => {
    const item = await h.seedItem({ status: "draft" });
    await h.seedReviewers(item.id, ["bob"]);

    const outcome = await h.core.approvals.unassign(await h.as("mia"), {
      itemId: item.id,
      reviewerId: "bob",
    });

    expect(outcome.aggregate).toBe("NoReviewersRequired");
    expect(outcome.autoTransition).toBeNull();
    expect((await h.item(item.id))?.status).toBe("draft");
  });
});

// ---------------------------------------------------------------------------
// Review rounds
// ---------------------------------------------------------------------------

describe("moveItem / resetApprovals", () => {
  it("opens a fresh round when the item re-enters review", async () => {
    const item = await h.seedItem({ status: "in_review" });
    await h.seedReviewers(item.id, ["bob", "carol"]);
    await decide("carol", item.id, "rejected");

    const alice = await h.as("alice");
    await h.core.approvals.moveItem(alice, { itemId: item.id, targetStatus: "draft" });
    await h.core.approvals.moveItem(alice, { itemId: item.id, targetStatus: "submitted" });
    expect(await states(item.id)).toEqual({ bob: "pending", carol: "rejected" });

    const moved = await h.core.approvals.moveItem(alice, {
      itemId: item.id,
      targetStatus: "in_review",
    });

    expect(moved.status).toBe("in_review");
    expect(await states(item.id)).toEqual({ bob: "pending", carol: "pending" });
  });

  it("resets every decided reviewer on request", async () => {
    const item = await h.seedItem({ status: "in_review" });
    await h.seedReviewers(item.id, ["bob", "carol"]);
    await decide("bob", item.id, "approved");

    const reset = await h.core.approvals.resetApprovals(await h.as("mia"), item.id);

    expect(reset.map((a) => a.state)).toEqual(["pending", "pending"]);
    expect(await states(item.id)).toEqual({ bob: "pending", carol: "pending" });
  });
});

// ---------------------------------------------------------------------------
// Reads
// ---------------------------------------------------------------------------

describe("getApprovalCount / getApprovalSummary", () => {
  it("counts approvals against all assignments", async () => {
    const item = await h.seedItem({ status: "in_review" });
    await h.seedReviewers(item.id, ["bob", "carol", "dave"]);
    await decide("bob", item.id, "approved");

    const vic = await h.as("vic");
    expect(await h.core.approvals.getApprovalCount(vic, item.id)).toEqual({ approved: 1, total: 3 });

    const summary = await h.core.approvals.getApprovalSummary(vic, item.id);
    expect(summary).toMatchObject({
      aggregate: "PendingReview",
      approved: 1,
      pending: 2,
      rejected: 0,
      progressPercent: 33,
      isComplete: false,
    });
    expect(summary.reviewers.map((r) => r.reviewerId)).toEqual(["bob", "carol", "dave"]);
  });
});
