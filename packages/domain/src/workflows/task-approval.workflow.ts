/**
 * Task Approval Workflow
 *
 * Items are drafted, submitted, then reviewed. Once every reviewer has
 * approved the item moves to "approved"; any rejection sends it to
 * "changes_requested", from where the owner reworks the draft.
 */

import { defineWorkflowTemplate } from "@workgate/contracts";

export const TaskApprovalWorkflow = defineWorkflowTemplate({
  name: "Task approval",
  statuses: [
    { key: "draft", label: "Draft", category: "todo", initial: true },
    { key: "submitted", label: "Submitted", category: "in_progress", milestone: "submitted" },
    {
      key: "in_review",
      label: "In review",
      category: "in_progress",
      reviewable: true,
      milestone: "reviewStarted",
    },
    { key: "approved", label: "Approved", category: "done", terminal: true, milestone: "approved" },
    {
      key: "changes_requested",
      label: "Changes requested",
      category: "in_progress",
      milestone: "rejected",
    },
  ],
  rules: [
    { from: "draft", to: "submitted", enabled: true },
    { from: "submitted", to: "draft", enabled: true, allowedRoles: ["owner", "manager"] },
    { from: "submitted", to: "in_review", enabled: true, allowedRoles: ["manager", "admin"] },
    { from: "in_review", to: "approved", enabled: true },
    { from: "in_review", to: "changes_requested", enabled: true },
    // Withdraw
    { from: "in_review", to: "draft", enabled: true, allowedRoles: ["owner", "manager"] },
    { from: "changes_requested", to: "draft", enabled: true },
  ],
  approval: { approvedStatus: "approved", rejectedStatus: "changes_requested" },
});
