/**
 * Work Item Actions
 *
 * Create, read, move, archive and comment on work items. Manual status changes go
 * through the aggregator so that entering a review status opens a fresh
 * review round.
 */

import { z } from "zod";
import { defineAction } from "@workgate/contracts";
import { getWorkflowCore } from "../services/index.js";

const itemRef = z.object({ itemId: z.string().min(1) });

export const createWorkItem = defineAction({
  id: "workItem.create",
  name: "Create Work Item",
  description:
    "Creates a work item in a project. It starts in the workflow's initial status unless another status is given.",
  inputSchema: z.object({
    projectId: z.string().min(1),
    title: z.string().trim().min(1).max(500),
    key: z.string().max(40).nullable().optional(),
    ownerId: z.string().min(1).nullable().optional(),
    ownerType: z.enum(["user", "team"]).optional(),
    status: z.string().min(1).optional(),
  }),
  capability: "edit",
  idempotent: false,
  examples: [
    { description: "Create an expense claim", input: { projectId: "finance", title: "March travel" } },
  ],
  execute: (input, context) => getWorkflowCore().workItems.create(context.tenant, input),
});

export const getWorkItem = defineAction({
  id: "workItem.get",
  name: "Get Work Item",
  description: "Returns one work item of the current tenant.",
  inputSchema: itemRef,
  capability: "view",
  idempotent: true,
  execute: (input, context) => getWorkflowCore().workItems.get(context.tenant, input.itemId),
});

export const listWorkItems = defineAction({
  id: "workItem.list",
  name: "List Work Items",
  description: "Lists work items, oldest first, optionally by project and status.",
  inputSchema: z.object({
    projectId: z.string().min(1).optional(),
    status: z.string().min(1).optional(),
    includeArchived: z.boolean().default(false),
    limit: z.number().int().min(1).max(200).default(50),
    offset: z.number().int().min(0).default(0),
  }),
  capability: "view",
  idempotent: true,
  execute: (input, context) => getWorkflowCore().workItems.list(context.tenant, input),
});

export const transitionWorkItem = defineAction({
  id: "workItem.transition",
  name: "Transition Work Item",
  description:
    "Moves a work item to another status of its workflow. Entering a review status resets earlier review decisions.",
  inputSchema: itemRef.extend({
    targetStatus: z.string().min(1),
    note: z.string().max(2000).nullable().optional(),
  }),
  capability: "edit",
  idempotent: false,
  examples: [
    { description: "Submit for review", input: { itemId: "item-1", targetStatus: "in_review" } },
  ],
  execute: (input, context) => getWorkflowCore().approvals.moveItem(context.tenant, input),
});

export const allowedTransitions = defineAction({
  id: "workItem.allowedTransitions",
  name: "Allowed Transitions",
  description: "Lists the statuses the caller may move the item to right now.",
  inputSchema: itemRef,
  capability: "view",
  idempotent: true,
  execute: (input, context) =>
    getWorkflowCore().engine.allowedTargets(context.tenant, input.itemId),
});

export const archiveWorkItem = defineAction({
  id: "workItem.archive",
  name: "Archive Work Item",
  description: "Archives a work item. Archived items accept no further changes.",
  inputSchema: itemRef,
  capability: "manage",
  idempotent: true,
  execute: (input, context) => getWorkflowCore().workItems.archive(context.tenant, input.itemId),
});

export const workItemHistory = defineAction({
  id: "workItem.history",
  name: "Work Item History",
  description: "Returns the item's audit trail as a timeline, oldest first.",
  inputSchema: itemRef,
  capability: "view",
  idempotent: true,
  execute: (input, context) => getWorkflowCore().workItems.history(context.tenant, input.itemId),
});

export const commentOnWorkItem = defineAction({
  id: "workItem.comment",
  name: "Comment on Work Item",
  description: "Adds a comment to a work item. Archived items take no comments.",
  inputSchema: itemRef.extend({
    content: z.string().trim().min(1).max(10_000),
  }),
  capability: "edit",
  idempotent: false,
  examples: [
    { description: "Ask for a receipt", input: { itemId: "item-1", content: "Please attach the hotel receipt." } },
  ],
  execute: (input, context) => getWorkflowCore().workItems.addComment(context.tenant, input),
});

export const listWorkItemComments = defineAction({
  id: "workItem.comments",
  name: "List Work Item Comments",
  description: "Returns the item's comments, oldest first.",
  inputSchema: itemRef,
  capability: "view",
  idempotent: true,
  execute: (input, context) =>
    getWorkflowCore().workItems.listComments(context.tenant, input.itemId),
});

export const workItemActions = [
  createWorkItem,
  getWorkItem,
  listWorkItems,
  transitionWorkItem,
  allowedTransitions,
  archiveWorkItem,
  workItemHistory,
  commentOnWorkItem,
  listWorkItemComments,
];
