/**
 * Approval Aggregator
 *
 * Maintains an item's reviewer assignments and drives the automatic status
 * transition their collective outcome calls for.
 *
 * Every mutation runs under the item lock, so two reviewers deciding at the
 * same moment are serialized: only the second one can observe "everyone has
 * now approved", and the item moves exactly once.
 *
 * Outcome handling after a decision (or an unassignment) while the item is
 * in a reviewable status:
 *   FullyApproved → one automatic transition to approval.approvedStatus
 *   Rejected      → one automatic transition to approval.rejectedStatus,
 *                   then every other decided reviewer goes back to pending
 *
 * At most one automatic transition happens per call, and the engine never
 * calls back into this class.
 */

import {
  WORK_ITEM_EVENTS,
  reviewerDecisionRecorded,
  type ApprovalAggregate,
  type ApprovalCount,
  type ApprovalSummary,
  type DomainEvent,
  type ReviewDecision,
  type ReviewerAssignment,
  type TenantContext,
  type WorkflowDefinition,
  type WorkflowTransaction,
  type WorkItem,
} from "@workgate/contracts";
import {
  AlreadyDecidedError,
  NotFoundError,
  NotInReviewableStateError,
  UnknownReviewerError,
} from "../errors/index.js";
import {
  assertNotArchived,
  requireItem,
  requireWorkflow,
  type AppliedTransition,
  type EngineDependencies,
  type StatusTransitionEngine,
  type TransitionRequest,
} from "../workflow/engine.js";
import { isReviewable } from "../workflow/validate.js";
import { countApprovals, deriveAggregate, summarizeApprovals } from "./aggregate.js";

export interface DecisionRequest {
  itemId: string;
  decision: ReviewDecision;
  note?: string | null;
}

export interface AutoTransition {
  from: string;
  to: string;
}

export interface DecisionOutcome {
  assignment: ReviewerAssignment;
  aggregate: ApprovalAggregate;
  item: WorkItem;
  autoTransition: AutoTransition | null;
}

export interface AssignOutcome {
  assignment: ReviewerAssignment;
  created: boolean;
}

export interface UnassignOutcome {
  removed: boolean;
  aggregate: ApprovalAggregate;
  item: WorkItem;
  autoTransition: AutoTransition | null;
}

interface Settlement {
  aggregate: ApprovalAggregate;
  item: WorkItem;
  applied: AppliedTransition | null;
  events: DomainEvent[];
}

export class ApprovalAggregator {
  constructor(
    private readonly deps: EngineDependencies,
    private readonly engine: StatusTransitionEngine
  ) {}

  // -------------------------------------------------------------------------
  // Decisions
  // -------------------------------------------------------------------------

  /**
   * Records the calling reviewer's decision and applies its consequence.
   *
   * @throws NotFoundError, ItemArchivedError, NotInReviewableStateError,
   *         UnknownReviewerError, AlreadyDecidedError, InvalidTransitionError,
   *         PersistenceError
   */
  async recordDecision(context: TenantContext, request: DecisionRequest): Promise<DecisionOutcome> {
    const reviewerId = context.principal.userId;

    const { outcome, events } = await this.deps.store.withItemLock(
      context.tenant.id,
      request.itemId,
      async (tx) => {
        const item = await requireItem(tx, request.itemId);
        assertNotArchived(item);
        const workflow = await requireWorkflow(tx, item.projectId);

        if (!isReviewable(workflow, item.status)) {
          throw new NotInReviewableStateError(item.id, item.status);
        }

        const assignments = await tx.listAssignments(item.id);
        const current = assignments.find((a) => a.reviewerId === reviewerId);
        if (!current) {
          throw new UnknownReviewerError(item.id, reviewerId);
        }

        if (current.state !== "pending") {
          throw new AlreadyDecidedError(item.id, reviewerId, current.state);
        }

        const decided: ReviewerAssignment = {
          ...current,
          state: request.decision,
          decidedAt: this.deps.clock(),
          note: request.note ?? null,
        };
        await tx.updateAssignment(decided);
        await this.deps.audit.record(tx, {
          tenantId: context.tenant.id,
          actorId: reviewerId,
          action: request.decision === "approved" ? "ReviewerApproved" : "ReviewerRejected",
          entityType: "ReviewerAssignment",
          entityId: decided.id,
          workItemId: item.id,
          previousValue: current.state,
          newValue: decided.state,
          note: decided.note,
          metadata: { reviewerId },
        });

        const updatedSet = assignments.map((a) => (a.id === decided.id ? decided : a));
        const settlement = await this.settle(tx, context, workflow, item, updatedSet, reviewerId);

        const result: DecisionOutcome = {
          assignment: decided,
          aggregate: settlement.aggregate,
          item: settlement.item,
          autoTransition: toAutoTransition(settlement.applied),
        };
        return {
          outcome: result,
          events: [
            reviewerDecisionRecorded({
              tenantId: context.tenant.id,
              workItemId: item.id,
              reviewerId,
              decision: request.decision,
              note: decided.note,
            }),
            ...settlement.events,
          ],
        };
      }
    );

    this.deps.events(events);
    return outcome;
  }

  // -------------------------------------------------------------------------
  // Assignment
  // -------------------------------------------------------------------------

  /**
   * Assigns a reviewer. Assigning someone already assigned returns the
   * existing assignment untouched, decision included.
   */
  async assign(
    context: TenantContext,
    request: { itemId: string; reviewerId: string }
  ): Promise<AssignOutcome> {
    const { outcome, events } = await this.deps.store.withItemLock(
      context.tenant.id,
      request.itemId,
      async (tx) => {
        const item = await requireItem(tx, request.itemId);
        assertNotArchived(item);

        const assignments = await tx.listAssignments(item.id);
        const existing = assignments.find((a) => a.reviewerId === request.reviewerId);
        if (existing) {
          return { outcome: { assignment: existing, created: false }, events: [] };
        }

        await this.requireTenantMember(context, request.reviewerId);

        const assignment: ReviewerAssignment = {
          id: crypto.randomUUID(),
          tenantId: context.tenant.id,
          workItemId: item.id,
          reviewerId: request.reviewerId,
          state: "pending",
          decidedAt: null,
          note: null,
          order: assignments.reduce((max, a) => Math.max(max, a.order), 0) + 1,
          createdAt: this.deps.clock(),
        };
        await tx.insertAssignment(assignment);
        await this.deps.audit.record(tx, {
          tenantId: context.tenant.id,
          actorId: context.principal.userId,
          action: "ReviewerAssigned",
          entityType: "ReviewerAssignment",
          entityId: assignment.id,
          workItemId: item.id,
          previousValue: null,
          newValue: assignment.reviewerId,
          note: null,
          metadata: { order: assignment.order },
        });

        return {
          outcome: { assignment, created: true },
          events: [
            {
              type: WORK_ITEM_EVENTS.reviewerAssigned,
              payload: {
                tenantId: context.tenant.id,
                workItemId: item.id,
                reviewerId: assignment.reviewerId,
              },
            },
          ],
        };
      }
    );

    this.deps.events(events);
    return outcome;
  }

  /**
   * Removes a reviewer, discarding any decision they made. Unassigning
   * someone who is not assigned is a no-op. While the item is reviewable,
   * the remaining set is re-evaluated exactly as after a decision.
   */
  async unassign(
    context: TenantContext,
    request: { itemId: string; reviewerId: string }
  ): Promise<UnassignOutcome> {
    const { outcome, events } = await this.deps.store.withItemLock(
      context.tenant.id,
      request.itemId,
      async (tx) => {
        const item = await requireItem(tx, request.itemId);
        assertNotArchived(item);

        const assignments = await tx.listAssignments(item.id);
        const existing = assignments.find((a) => a.reviewerId === request.reviewerId);
        if (!existing) {
          const unchanged: UnassignOutcome = {
            removed: false,
            aggregate: deriveAggregate(assignments),
            item,
            autoTransition: null,
          };
          return { outcome: unchanged, events: [] };
        }

        await tx.deleteAssignment(existing.id);
        await this.deps.audit.record(tx, {
          tenantId: context.tenant.id,
          actorId: context.principal.userId,
          action: "ReviewerUnassigned",
          entityType: "ReviewerAssignment",
          entityId: existing.id,
          workItemId: item.id,
          previousValue: existing.reviewerId,
          newValue: null,
          note: null,
          metadata: { discardedState: existing.state },
        });

        const remaining = assignments.filter((a) => a.id !== existing.id);
        const workflow = await requireWorkflow(tx, item.projectId);
        const settlement = await this.settle(tx, context, workflow, item, remaining, null);

        const result: UnassignOutcome = {
          removed: true,
          aggregate: settlement.aggregate,
          item: settlement.item,
          autoTransition: toAutoTransition(settlement.applied),
        };
        return {
          outcome: result,
          events: [
            {
              type: WORK_ITEM_EVENTS.reviewerUnassigned,
              payload: {
                tenantId: context.tenant.id,
                workItemId: item.id,
                reviewerId: existing.reviewerId,
              },
            },
            ...settlement.events,
          ],
        };
      }
    );

    this.deps.events(events);
    return outcome;
  }

  /**
   * Puts every decided reviewer back to pending, e.g. before a resubmission.
   */
  async resetApprovals(context: TenantContext, itemId: string): Promise<ReviewerAssignment[]> {
    return this.deps.store.withItemLock(context.tenant.id, itemId, async (tx) => {
      const item = await requireItem(tx, itemId);
      assertNotArchived(item);

      const assignments = await tx.listAssignments(item.id);
      return this.resetDecided(tx, context, item, assignments, () => true, "reset");
    });
  }

  /**
   * Manual status change that opens a fresh review round: when the item
   * enters a reviewable status from a non-reviewable one, every earlier
   * decision is reset to pending in the same transaction.
   */
  async moveItem(context: TenantContext, request: TransitionRequest): Promise<WorkItem> {
    const applied = await this.deps.store.withItemLock(
      context.tenant.id,
      request.itemId,
      async (tx) => {
        const result = await this.engine.applyManual(tx, context, request);
        const opensRound =
          isReviewable(result.workflow, result.to) && !isReviewable(result.workflow, result.from);

        if (opensRound) {
          const assignments = await tx.listAssignments(result.item.id);
          await this.resetDecided(tx, context, result.item, assignments, () => true, "resubmitted");
        }
        return result;
      }
    );

    this.deps.events(applied.events);
    return applied.item;
  }

  // -------------------------------------------------------------------------
  // Reads (lock-free snapshots; may be stale the moment they return)
  // -------------------------------------------------------------------------

  async getApprovalCount(context: TenantContext, itemId: string): Promise<ApprovalCount> {
    const reader = this.deps.store.reader(context.tenant.id);
    await requireItem(reader, itemId);
    return countApprovals(await reader.listAssignments(itemId));
  }

  async getApprovalSummary(context: TenantContext, itemId: string): Promise<ApprovalSummary> {
    const reader = this.deps.store.reader(context.tenant.id);
    await requireItem(reader, itemId);
    return summarizeApprovals(itemId, await reader.listAssignments(itemId));
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  /**
   * Re-evaluates the aggregate and applies at most one automatic
   * transition. `decidedBy` is the reviewer whose decision triggered the
   * evaluation; their assignment is never reset.
   */
  private async settle(
    tx: WorkflowTransaction,
    context: TenantContext,
    workflow: WorkflowDefinition,
    item: WorkItem,
    assignments: ReviewerAssignment[],
    decidedBy: string | null
  ): Promise<Settlement> {
    const aggregate = deriveAggregate(assignments);
    const approval = workflow.approval;

    if (!approval || !isReviewable(workflow, item.status)) {
      return { aggregate, item, applied: null, events: [] };
    }

    if (aggregate === "FullyApproved") {
      const applied = await this.engine.apply(tx, context, workflow, item, approval.approvedStatus, {
        origin: "approval",
        note: null,
      });
      return { aggregate, item: applied.item, applied, events: applied.events };
    }

    if (aggregate === "Rejected") {
      const applied = await this.engine.apply(tx, context, workflow, item, approval.rejectedStatus, {
        origin: "approval",
        note: null,
      });

      const rejecter =
        decidedBy ?? assignments.find((a) => a.state === "rejected")?.reviewerId ?? null;
      await this.resetDecided(
        tx,
        context,
        applied.item,
        assignments,
        (a) => a.reviewerId !== rejecter,
        "rejected"
      );
      return { aggregate, item: applied.item, applied, events: applied.events };
    }

    return { aggregate, item, applied: null, events: [] };
  }

  private async resetDecided(
    tx: WorkflowTransaction,
    context: TenantContext,
    item: WorkItem,
    assignments: ReviewerAssignment[],
    include: (assignment: ReviewerAssignment) => boolean,
    reason: "reset" | "resubmitted" | "rejected"
  ): Promise<ReviewerAssignment[]> {
    const result: ReviewerAssignment[] = [];

    for (const assignment of assignments) {
      if (assignment.state === "pending" || !include(assignment)) {
        result.push(assignment);
        continue;
      }

      const reset: ReviewerAssignment = { ...assignment, state: "pending", decidedAt: null, note: null };
      await tx.updateAssignment(reset);
      await this.deps.audit.record(tx, {
        tenantId: context.tenant.id,
        actorId: context.principal.userId,
        action: "ReviewerReset",
        entityType: "ReviewerAssignment",
        entityId: assignment.id,
        workItemId: item.id,
        previousValue: assignment.state,
        newValue: "pending",
        note: null,
        metadata: { reviewerId: assignment.reviewerId, reason },
      });
      result.push(reset);
    }

    return result;
  }

  private async requireTenantMember(context: TenantContext, userId: string): Promise<void> {
    const role = await this.deps.identity.membershipRole(
      { userId, type: "human" },
      context.tenant.id
    );
    if (!role) {
      throw new NotFoundError("Tenant member", userId);
    }
  }
}

function toAutoTransition(applied: AppliedTransition | null): AutoTransition | null {
  return applied ? { from: applied.from, to: applied.to } : null;
}
