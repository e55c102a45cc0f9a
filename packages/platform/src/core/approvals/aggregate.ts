/**
 * Approval Aggregate
 *
 * Pure derivation of an item's collective review outcome from its
 * assignments. Only the final set of states matters, never the order in
 * which decisions arrived. Rejection dominates everything else.
 */

import type {
  ApprovalAggregate,
  ApprovalCount,
  ApprovalSummary,
  ReviewerAssignment,
} from "@workgate/contracts";

export function deriveAggregate(assignments: readonly ReviewerAssignment[]): ApprovalAggregate {
  if (assignments.length === 0) return "NoReviewersRequired";
  if (assignments.some((a) => a.state === "rejected")) return "Rejected";
  if (assignments.every((a) => a.state === "approved")) return "FullyApproved";
  return "PendingReview";
}

export function countApprovals(assignments: readonly ReviewerAssignment[]): ApprovalCount {
  return {
    approved: assignments.filter((a) => a.state === "approved").length,
    total: assignments.length,
  };
}

export function summarizeApprovals(
  workItemId: string,
  assignments: readonly ReviewerAssignment[]
): ApprovalSummary {
  const { approved, total } = countApprovals(assignments);
  const rejected = assignments.filter((a) => a.state === "rejected").length;
  const aggregate = deriveAggregate(assignments);

  return {
    workItemId,
    aggregate,
    total,
    approved,
    rejected,
    pending: total - approved - rejected,
    isComplete: aggregate === "FullyApproved",
    isRejected: aggregate === "Rejected",
    progressPercent: total === 0 ? 0 : Math.floor((approved / total) * 100),
    reviewers: [...assignments].sort((a, b) => a.order - b.order),
  };
}
