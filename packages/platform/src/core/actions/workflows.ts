/**
 * Workflow, Tenant and Audit Actions
 */

import { z } from "zod";
import {
  AUDIT_ACTIONS,
  AUDIT_ENTITY_TYPES,
  defineAction,
  workflowInputSchema,
} from "@workgate/contracts";
import { queryAuditTrail } from "../audit/index.js";
import { getWorkflowCore } from "../services/index.js";

export const currentTenant = defineAction({
  id: "tenant.current",
  name: "Current Tenant",
  description: "Returns the tenant this request resolved to and the caller's role in it.",
  inputSchema: z.object({}).default({}),
  capability: "view",
  idempotent: true,
  execute: async (_input, context) => ({
    tenant: context.tenant.tenant,
    userId: context.tenant.principal.userId,
    role: context.tenant.role,
    viaSuperuser: context.tenant.viaSuperuser,
  }),
});

export const getWorkflow = defineAction({
  id: "workflow.get",
  name: "Get Workflow",
  description: "Returns a project's workflow definition.",
  inputSchema: z.object({ projectId: z.string().min(1) }),
  capability: "view",
  idempotent: true,
  execute: (input, context) => getWorkflowCore().workflows.get(context.tenant, input.projectId),
});

export const configureWorkflow = defineAction({
  id: "workflow.configure",
  name: "Configure Workflow",
  description:
    "Validates and saves a project's statuses, transition rules and approval policy.",
  inputSchema: workflowInputSchema,
  capability: "administer",
  idempotent: true,
  execute: (input, context) => getWorkflowCore().workflows.configure(context.tenant, input),
});

export const listAudit = defineAction({
  id: "audit.list",
  name: "List Audit Entries",
  description: "Pages through the tenant's audit trail, newest first.",
  inputSchema: z.object({
    actorId: z.string().min(1).optional(),
    action: z.enum(AUDIT_ACTIONS).optional(),
    entityType: z.enum(AUDIT_ENTITY_TYPES).optional(),
    workItemId: z.string().min(1).optional(),
    dateFrom: z.coerce.date().optional(),
    dateTo: z.coerce.date().optional(),
    limit: z.number().int().min(1).max(200).default(50),
    offset: z.number().int().min(0).default(0),
  }),
  capability: "manage",
  idempotent: true,
  execute: (input, context) =>
    queryAuditTrail(getWorkflowCore().store.reader(context.tenant.tenant.id), input),
});

export const workflowActions = [currentTenant, getWorkflow, configureWorkflow, listAudit];
