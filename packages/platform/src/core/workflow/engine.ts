/**
 * Status Transition Engine
 *
 * Moves a work item between statuses along the edges of its project's
 * workflow. Every mutation happens under the item's exclusive lock, inside
 * one transaction that also writes the StatusChange audit entry:
 *
 *   lock → read item → validate → update status + milestone → audit → commit
 *
 * Events are handed to the event sink only after commit.
 *
 * The approval aggregator calls apply() inside its own locked transaction
 * with origin "approval"; such automatic transitions still follow the graph
 * but skip per-rule role restrictions. The engine never calls back into the
 * aggregator.
 */

import {
  itemStatusChanged,
  type DomainEvent,
  type IdentityProvider,
  type StatusTransitionRule,
  type TenantContext,
  type TransitionPolicy,
  type WorkflowDefinition,
  type WorkflowReader,
  type WorkflowStatus,
  type WorkflowStore,
  type WorkflowTransaction,
  type WorkItem,
} from "@workgate/contracts";
import type { AuditRecorder, Clock } from "../audit/index.js";
import type { EventSink } from "../event-bus/index.js";
import { ItemArchivedError, NotFoundError, PermissionError } from "../errors/index.js";
import { TransitionGraph } from "./graph.js";

export interface EngineDependencies {
  store: WorkflowStore;
  identity: IdentityProvider;
  audit: AuditRecorder;
  events: EventSink;
  policy: TransitionPolicy;
  clock: Clock;
}

export type TransitionOrigin = "manual" | "approval";

export interface TransitionRequest {
  itemId: string;
  targetStatus: string;
  note?: string | null;
}

export interface AppliedTransition {
  item: WorkItem;
  workflow: WorkflowDefinition;
  from: string;
  to: string;
  events: DomainEvent[];
}

// ---------------------------------------------------------------------------
// Shared lookups (also used by the aggregator and work item service)
// ---------------------------------------------------------------------------

export async function requireItem(reader: WorkflowReader, itemId: string): Promise<WorkItem> {
  const item = await reader.findItem(itemId);
  if (!item) {
    throw new NotFoundError("Work item", itemId);
  }
  return item;
}

export async function requireWorkflow(
  reader: WorkflowReader,
  projectId: string
): Promise<WorkflowDefinition> {
  const workflow = await reader.findWorkflow(projectId);
  if (!workflow) {
    throw new NotFoundError("Workflow", projectId);
  }
  return workflow;
}

export function assertNotArchived(item: WorkItem): void {
  if (item.archived) {
    throw new ItemArchivedError(item.id);
  }
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export class StatusTransitionEngine {
  constructor(private readonly deps: EngineDependencies) {}

  /**
   * Manual status change requested by the caller.
   *
   * @throws NotFoundError, ItemArchivedError, InvalidTransitionError,
   *         PermissionError, PersistenceError
   */
  async transition(context: TenantContext, request: TransitionRequest): Promise<WorkItem> {
    const applied = await this.deps.store.withItemLock(
      context.tenant.id,
      request.itemId,
      (tx) => this.applyManual(tx, context, request)
    );

    this.deps.events(applied.events);
    return applied.item;
  }

  /**
   * Manual transition inside a transaction whose caller already holds the
   * item lock.
   */
  async applyManual(
    tx: WorkflowTransaction,
    context: TenantContext,
    request: TransitionRequest
  ): Promise<AppliedTransition> {
    const item = await requireItem(tx, request.itemId);
    assertNotArchived(item);
    const workflow = await requireWorkflow(tx, item.projectId);

    return this.apply(tx, context, workflow, item, request.targetStatus, {
      origin: "manual",
      note: request.note ?? null,
    });
  }

  /**
   * Validates and applies one transition within `tx`. The item must have
   * been read under the lock `tx` holds.
   */
  async apply(
    tx: WorkflowTransaction,
    context: TenantContext,
    workflow: WorkflowDefinition,
    item: WorkItem,
    targetStatus: string,
    options: { origin: TransitionOrigin; note: string | null }
  ): Promise<AppliedTransition> {
    assertNotArchived(item);

    const graph = new TransitionGraph(workflow, this.deps.policy);
    const rule = graph.check(item.status, targetStatus);

    if (options.origin === "manual" && !(await this.mayUse(tx, context, item, rule))) {
      throw new PermissionError(
        context.principal.userId,
        `transition "${item.status}" → "${targetStatus}"`
      );
    }

    const now = this.deps.clock();
    const from = item.status;
    const target = graph.status(targetStatus);
    const milestone = target?.milestone ?? (target?.terminal ? "completed" : undefined);

    const updated: WorkItem = {
      ...item,
      status: targetStatus,
      milestones: milestone ? { ...item.milestones, [milestone]: now } : item.milestones,
      updatedAt: now,
    };

    await tx.updateItem(updated);
    await this.deps.audit.record(tx, {
      tenantId: context.tenant.id,
      actorId: context.principal.userId,
      action: "StatusChange",
      entityType: "WorkItem",
      entityId: item.id,
      workItemId: item.id,
      previousValue: from,
      newValue: targetStatus,
      note: options.note,
      metadata: { origin: options.origin },
    });

    return {
      item: updated,
      workflow,
      from,
      to: targetStatus,
      events: [
        itemStatusChanged({
          tenantId: context.tenant.id,
          workItemId: item.id,
          from,
          to: targetStatus,
          actorId: context.principal.userId,
          origin: options.origin,
        }),
      ],
    };
  }

  /**
   * Statuses the caller could move the item to right now. Lock-free read.
   */
  async allowedTargets(context: TenantContext, itemId: string): Promise<WorkflowStatus[]> {
    const reader = this.deps.store.reader(context.tenant.id);
    const item = await requireItem(reader, itemId);
    if (item.archived) return [];

    const workflow = await requireWorkflow(reader, item.projectId);
    const graph = new TransitionGraph(workflow, this.deps.policy);

    const allowed: WorkflowStatus[] = [];
    for (const key of graph.targetsFrom(item.status)) {
      const rule = graph.check(item.status, key);
      const status = graph.status(key);
      if (status && (await this.mayUse(reader, context, item, rule))) {
        allowed.push(status);
      }
    }
    return allowed;
  }

  /**
   * Per-rule role restriction. Rules without allowedRoles are open to any
   * caller who passed the action's capability check.
   */
  private async mayUse(
    reader: WorkflowReader,
    context: TenantContext,
    item: WorkItem,
    rule: StatusTransitionRule | undefined
  ): Promise<boolean> {
    const allowed = rule?.allowedRoles;
    if (!allowed || allowed.length === 0) return true;
    if (context.viaSuperuser) return true;
    if (allowed.includes(context.role)) return true;

    const userId = context.principal.userId;

    if (allowed.includes("owner") && item.ownerId) {
      if (item.ownerType === "user" && item.ownerId === userId) return true;
      if (
        item.ownerType === "team" &&
        (await this.deps.identity.isTeamMember(context.principal, context.tenant.id, item.ownerId))
      ) {
        return true;
      }
    }

    if (allowed.includes("reviewer")) {
      const assignments = await reader.listAssignments(item.id);
      if (assignments.some((a) => a.reviewerId === userId)) return true;
    }

    return false;
  }
}
