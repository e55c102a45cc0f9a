import type { WorkflowInput, WorkflowTemplate } from "@workgate/contracts";
import { KanbanWorkflow } from "./kanban.workflow.js";
import { ScrumWorkflow } from "./scrum.workflow.js";
import { TaskApprovalWorkflow } from "./task-approval.workflow.js";
import { WaterfallWorkflow } from "./waterfall.workflow.js";

export { KanbanWorkflow, ScrumWorkflow, TaskApprovalWorkflow, WaterfallWorkflow };

export const workflowTemplates = {
  "task-approval": TaskApprovalWorkflow,
  scrum: ScrumWorkflow,
  kanban: KanbanWorkflow,
  waterfall: WaterfallWorkflow,
} satisfies Record<string, WorkflowTemplate>;

export type WorkflowTemplateId = keyof typeof workflowTemplates;

/**
 * Binds a template to a project, ready for workflow.configure.
 * Returns a copy; the template itself is never shared.
 */
export function workflowForProject(templateId: WorkflowTemplateId, projectId: string): WorkflowInput {
  const template: WorkflowTemplate = workflowTemplates[templateId];
  return structuredClone({
    projectId,
    name: template.name,
    statuses: template.statuses,
    rules: template.rules,
    ...(template.approval ? { approval: template.approval } : {}),
  });
}
