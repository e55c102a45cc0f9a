/**
 * Scrum Workflow
 *
 * Open → In progress → In review → Done. A rejected review sends the
 * item back to "in_progress"; managers may reopen done items.
 */

import { defineWorkflowTemplate } from "@workgate/contracts";

export const ScrumWorkflow = defineWorkflowTemplate({
  name: "Scrum",
  statuses: [
    { key: "open", label: "Open", category: "todo", initial: true },
    { key: "in_progress", label: "In progress", category: "in_progress" },
    {
      key: "in_review",
      label: "In review",
      category: "in_progress",
      reviewable: true,
      milestone: "reviewStarted",
    },
    { key: "done", label: "Done", category: "done", terminal: true },
  ],
  rules: [
    { from: "open", to: "in_progress", enabled: true },
    { from: "in_progress", to: "open", enabled: true },
    { from: "in_progress", to: "in_review", enabled: true },
    { from: "in_review", to: "done", enabled: true },
    { from: "in_review", to: "in_progress", enabled: true },
    { from: "done", to: "in_progress", enabled: true, allowedRoles: ["manager", "admin"] },
  ],
  approval: { approvedStatus: "done", rejectedStatus: "in_progress" },
});
