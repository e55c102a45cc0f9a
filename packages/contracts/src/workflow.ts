/**
 * Workflow Definition
 *
 * A workflow is configured per tenant and project. It names the status set
 * work items may hold, the directed edges between those statuses, and where
 * the approval aggregator sends an item once its reviewers have decided.
 *
 * The edge set is a plain directed graph: rework loops (rejected → draft →
 * submitted → ...) are expected, so nothing assumes it is acyclic.
 */

import { z } from "zod";
import { TENANT_ROLES, type TransitionActor } from "./permission.js";

export const MILESTONE_KEYS = [
  "submitted",
  "reviewStarted",
  "approved",
  "rejected",
  "completed",
] as const;

/** Timestamps stamped on a work item when it enters a linked status. */
export type MilestoneKey = (typeof MILESTONE_KEYS)[number];

/** Coarse grouping used by boards and reports. */
export type StatusCategory = "todo" | "in_progress" | "done";

export interface WorkflowStatus {
  /** Stable identifier stored on work items (e.g., "in_review") */
  key: string;

  /** Display label (e.g., "In Review") */
  label: string;

  category: StatusCategory;

  /** New items start here unless the caller names another status */
  initial?: boolean;

  /** No outgoing edges required; entering it stamps the "completed" milestone */
  terminal?: boolean;

  /** Reviewers may record decisions only while the item is in this status */
  reviewable?: boolean;

  /** Milestone stamped when an item enters this status */
  milestone?: MilestoneKey;
}

/**
 * A single edge in the transition graph.
 */
export interface StatusTransitionRule {
  from: string;
  to: string;

  /** Disabled rules stay in the configuration but grant nothing */
  enabled: boolean;

  /**
   * Restricts manual transitions along this edge. Omitted means any caller
   * with the edit capability. Automatic transitions ignore this list.
   */
  allowedRoles?: TransitionActor[];
}

/**
 * Where the approval aggregator moves an item once the reviewers' collective
 * outcome is known.
 */
export interface ApprovalPolicy {
  approvedStatus: string;
  rejectedStatus: string;
}

export interface WorkflowDefinition {
  projectId: string;
  name: string;
  statuses: WorkflowStatus[];
  rules: StatusTransitionRule[];
  approval?: ApprovalPolicy;
  updatedAt?: Date;
}

/**
 * What an empty rule set means.
 *   open   — any transition inside the status set is allowed
 *   closed — no transition is allowed until rules are configured
 */
export type TransitionPolicy = "open" | "closed";

/** A reusable workflow not yet bound to a project. */
export type WorkflowTemplate = Omit<WorkflowDefinition, "projectId" | "updatedAt">;

/**
 * Helper to define a workflow template with type checking.
 */
export function defineWorkflowTemplate(template: WorkflowTemplate): WorkflowTemplate {
  return template;
}

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const statusKey = z
  .string()
  .min(1)
  .max(64)
  .regex(/^[a-z][a-z0-9_]*$/, "Status keys are lowercase snake_case");

export const workflowStatusSchema = z.object({
  key: statusKey,
  label: z.string().min(1).max(120),
  category: z.enum(["todo", "in_progress", "done"]),
  initial: z.boolean().optional(),
  terminal: z.boolean().optional(),
  reviewable: z.boolean().optional(),
  milestone: z.enum(MILESTONE_KEYS).optional(),
});

const transitionActorSchema = z.union([
  z.enum(TENANT_ROLES),
  z.enum(["owner", "reviewer"]),
]);

export const statusTransitionRuleSchema = z.object({
  from: statusKey,
  to: statusKey,
  enabled: z.boolean().default(true),
  allowedRoles: z.array(transitionActorSchema).optional(),
});

export const approvalPolicySchema = z.object({
  approvedStatus: statusKey,
  rejectedStatus: statusKey,
});

/** Shape accepted when a tenant configures a project's workflow. */
export const workflowInputSchema = z.object({
  projectId: z.string().min(1).max(120),
  name: z.string().min(1).max(120),
  statuses: z.array(workflowStatusSchema).min(1),
  rules: z.array(statusTransitionRuleSchema).default([]),
  approval: approvalPolicySchema.optional(),
});

export type WorkflowInput = z.infer<typeof workflowInputSchema>;
