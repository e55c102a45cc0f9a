/**
 * Work Items and Reviewer Assignments
 *
 * A work item (task or issue) moves between the statuses of its project's
 * workflow. Reviewers are assigned per item; their individual decisions are
 * aggregated into one outcome that can move the item automatically.
 */

import type { MilestoneKey } from "./workflow.js";

export type OwnerType = "user" | "team";

export interface WorkItem {
  id: string;
  tenantId: string;
  projectId: string;

  /** Optional human-facing key (e.g., "OPS-42") */
  key: string | null;

  title: string;

  /** Always a key from the project's workflow status set */
  status: string;

  ownerId: string | null;
  ownerType: OwnerType;

  /** Archived items are frozen: no transitions, no reviewer changes */
  archived: boolean;
  archivedAt: Date | null;

  milestones: Partial<Record<MilestoneKey, Date>>;

  createdAt: Date;
  updatedAt: Date;
}

/** A note left on a work item. Append-only: never edited or deleted. */
export interface WorkItemComment {
  id: string;
  tenantId: string;
  workItemId: string;
  authorId: string;
  content: string;
  createdAt: Date;
}

export type ReviewState = "pending" | "approved" | "rejected";

/** The two decisions a reviewer can record. */
export type ReviewDecision = "approved" | "rejected";

export interface ReviewerAssignment {
  id: string;
  tenantId: string;
  workItemId: string;
  reviewerId: string;
  state: ReviewState;
  decidedAt: Date | null;
  note: string | null;

  /** Position in the review list, in assignment order */
  order: number;

  createdAt: Date;
}

/**
 * The collective outcome of an item's reviewers. Derived, never stored.
 *
 *   NoReviewersRequired — nobody is assigned
 *   PendingReview       — someone has not decided and nobody rejected
 *   FullyApproved       — everyone approved
 *   Rejected            — at least one reviewer rejected
 */
export type ApprovalAggregate =
  | "NoReviewersRequired"
  | "PendingReview"
  | "FullyApproved"
  | "Rejected";

export interface ApprovalCount {
  approved: number;
  total: number;
}

export interface ApprovalSummary {
  workItemId: string;
  aggregate: ApprovalAggregate;
  total: number;
  approved: number;
  rejected: number;
  pending: number;

  /** Every reviewer approved */
  isComplete: boolean;
  isRejected: boolean;

  /** Whole-number share of approvals, 0 without reviewers */
  progressPercent: number;

  reviewers: ReviewerAssignment[];
}
