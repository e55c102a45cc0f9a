/**
 * Waterfall Workflow
 *
 * Planned → Active → Completed, with a "blocked" side state. No review
 * step: completion is a manual sign-off by the owner or a manager.
 */

import { defineWorkflowTemplate } from "@workgate/contracts";

export const WaterfallWorkflow = defineWorkflowTemplate({
  name: "Waterfall",
  statuses: [
    { key: "planned", label: "Planned", category: "todo", initial: true },
    { key: "active", label: "Active", category: "in_progress" },
    { key: "blocked", label: "Blocked", category: "in_progress" },
    { key: "completed", label: "Completed", category: "done", terminal: true },
  ],
  rules: [
    { from: "planned", to: "active", enabled: true },
    { from: "active", to: "blocked", enabled: true },
    { from: "blocked", to: "active", enabled: true },
    { from: "active", to: "completed", enabled: true, allowedRoles: ["owner", "manager", "admin"] },
  ],
});
