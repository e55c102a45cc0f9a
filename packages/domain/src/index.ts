/**
 * @workgate/domain
 *
 * Ready-made workflow templates and the event subscribers the API
 * registers at startup. Depends only on @workgate/contracts.
 */

export {
  workflowTemplates,
  workflowForProject,
  TaskApprovalWorkflow,
  ScrumWorkflow,
  KanbanWorkflow,
  WaterfallWorkflow,
  type WorkflowTemplateId,
} from "./workflows/index.js";
export { createEventSubscribers } from "./subscribers/index.js";
