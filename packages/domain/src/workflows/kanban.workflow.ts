/**
 * Kanban Workflow
 *
 * A pull-based board: Backlog → Ready → In progress → Review → Done.
 */

import { defineWorkflowTemplate } from "@workgate/contracts";

export const KanbanWorkflow = defineWorkflowTemplate({
  name: "Kanban",
  statuses: [
    { key: "backlog", label: "Backlog", category: "todo", initial: true },
    { key: "ready", label: "Ready", category: "todo" },
    { key: "in_progress", label: "In progress", category: "in_progress" },
    {
      key: "review",
      label: "Review",
      category: "in_progress",
      reviewable: true,
      milestone: "reviewStarted",
    },
    { key: "done", label: "Done", category: "done", terminal: true },
  ],
  rules: [
    { from: "backlog", to: "ready", enabled: true },
    { from: "ready", to: "backlog", enabled: true },
    { from: "ready", to: "in_progress", enabled: true },
    { from: "in_progress", to: "ready", enabled: true },
    { from: "in_progress", to: "review", enabled: true },
    { from: "review", to: "done", enabled: true },
    { from: "review", to: "in_progress", enabled: true },
  ],
  approval: { approvedStatus: "done", rejectedStatus: "in_progress" },
});
