/**
 * Review Actions
 *
 * Reviewer assignment and decisions. review.decide only needs "view": the
 * assignment itself is the permission, and the aggregator refuses callers
 * who are not assigned.
 */

import { z } from "zod";
import { defineAction } from "@workgate/contracts";
import { getWorkflowCore } from "../services/index.js";

const reviewerRef = z.object({
  itemId: z.string().min(1),
  reviewerId: z.string().min(1),
});

export const assignReviewer = defineAction({
  id: "review.assign",
  name: "Assign Reviewer",
  description: "Assigns a tenant member as reviewer. Assigning twice returns the existing assignment.",
  inputSchema: reviewerRef,
  capability: "edit",
  idempotent: true,
  execute: (input, context) => getWorkflowCore().approvals.assign(context.tenant, input),
});

export const unassignReviewer = defineAction({
  id: "review.unassign",
  name: "Unassign Reviewer",
  description:
    "Removes a reviewer and their decision. The remaining reviewers' outcome may move the item.",
  inputSchema: reviewerRef,
  capability: "edit",
  idempotent: true,
  execute: (input, context) => getWorkflowCore().approvals.unassign(context.tenant, input),
});

export const decideReview = defineAction({
  id: "review.decide",
  name: "Record Review Decision",
  description:
    "Records the caller's approval or rejection. The last approval, or any rejection, moves the item.",
  inputSchema: z.object({
    itemId: z.string().min(1),
    decision: z.enum(["approved", "rejected"]),
    note: z.string().max(2000).nullable().optional(),
  }),
  capability: "view",
  idempotent: true,
  examples: [
    { description: "Approve", input: { itemId: "item-1", decision: "approved" } },
    {
      description: "Reject with a reason",
      input: { itemId: "item-1", decision: "rejected", note: "Receipts missing" },
    },
  ],
  execute: (input, context) => getWorkflowCore().approvals.recordDecision(context.tenant, input),
});

export const resetReviews = defineAction({
  id: "review.reset",
  name: "Reset Reviews",
  description: "Returns every decided reviewer of the item to pending.",
  inputSchema: z.object({ itemId: z.string().min(1) }),
  capability: "edit",
  idempotent: true,
  execute: (input, context) =>
    getWorkflowCore().approvals.resetApprovals(context.tenant, input.itemId),
});

export const reviewStatus = defineAction({
  id: "review.status",
  name: "Review Status",
  description: "Summarizes the item's reviewers and their collective outcome.",
  inputSchema: z.object({ itemId: z.string().min(1) }),
  capability: "view",
  idempotent: true,
  execute: (input, context) =>
    getWorkflowCore().approvals.getApprovalSummary(context.tenant, input.itemId),
});

export const reviewActions = [
  assignReviewer,
  unassignReviewer,
  decideReview,
  resetReviews,
  reviewStatus,
];
