/**
 * Workflow Configuration
 *
 * Saves a project's workflow definition after validating it. A definition
 * that drops a status some item still holds is refused, since the item
 * would otherwise be left outside its own status set. The save holds the
 * workflow's exclusive lock, so no transition or creation that read the old
 * definition can commit in between.
 */

import type { TenantContext, WorkflowDefinition, WorkflowInput } from "@workgate/contracts";
import { WorkflowConfigError } from "../errors/index.js";
import { requireWorkflow, type EngineDependencies } from "./engine.js";
import { findWorkflowProblems } from "./validate.js";

export class WorkflowConfigService {
  constructor(private readonly deps: EngineDependencies) {}

  async configure(context: TenantContext, input: WorkflowInput): Promise<WorkflowDefinition> {
    const definition: WorkflowDefinition = { ...input, updatedAt: this.deps.clock() };

    const problems = findWorkflowProblems(definition);
    if (problems.length > 0) {
      throw new WorkflowConfigError(problems);
    }

    const tenantId = context.tenant.id;
    return this.deps.store.withWorkflowLock(tenantId, definition.projectId, async (tx) => {
      const previous = await tx.findWorkflow(definition.projectId);
      const keys = new Set(definition.statuses.map((s) => s.key));

      const items = await tx.listItems({ projectId: definition.projectId, includeArchived: true });
      const stranded = [...new Set(items.map((i) => i.status).filter((s) => !keys.has(s)))];
      if (stranded.length > 0) {
        throw new WorkflowConfigError(
          stranded.map((status) => `Status "${status}" is still in use by work items`)
        );
      }

      await tx.saveWorkflow(definition);
      await this.deps.audit.record(tx, {
        tenantId,
        actorId: context.principal.userId,
        action: "WorkflowConfigured",
        entityType: "Workflow",
        entityId: definition.projectId,
        workItemId: null,
        previousValue: previous?.name ?? null,
        newValue: definition.name,
        note: null,
        metadata: {
          statuses: definition.statuses.length,
          rules: definition.rules.length,
          approval: definition.approval !== undefined,
        },
      });
      return definition;
    });
  }

  async get(context: TenantContext, projectId: string): Promise<WorkflowDefinition> {
    return requireWorkflow(this.deps.store.reader(context.tenant.id), projectId);
  }
}
