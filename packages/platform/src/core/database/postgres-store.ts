/**
 * PostgreSQL Workflow Store
 *
 * WorkflowStore over Drizzle. Each transaction is one db.transaction();
 * withItemLock first takes a row lock (SELECT ... FOR UPDATE) on the work
 * item and holds it until commit or rollback. Workflows read inside a
 * transaction are read FOR SHARE; withWorkflowLock takes the workflow row
 * FOR UPDATE, so reconfiguring waits for in-flight transitions and they
 * wait for it.
 *
 * Every statement filters on the bound tenant. Driver failures surface as
 * PersistenceError; errors the work function raised on purpose pass through
 * unchanged.
 */

import { and, asc, count, desc, eq, gte, lte, type SQL } from "drizzle-orm";
import type { PgDatabase } from "drizzle-orm/pg-core";
import type { PostgresJsQueryResultHKT } from "drizzle-orm/postgres-js";
import {
  MILESTONE_KEYS,
  type AuditEntry,
  type AuditQuery,
  type AuditQueryResult,
  type ReviewerAssignment,
  type WorkflowDefinition,
  type WorkflowReader,
  type WorkflowStore,
  type WorkflowTransaction,
  type WorkItem,
  type WorkItemComment,
  type WorkItemFilter,
} from "@workgate/contracts";
import { PersistenceError, PlatformError } from "../errors/index.js";
import type { Database } from "./connection.js";
import {
  auditEntries,
  reviewerAssignments,
  workflows,
  workItemComments,
  workItems,
} from "./schema.js";

/** Statements shared by the database handle and a transaction */
type Executor = Pick<PgDatabase<PostgresJsQueryResultHKT>, "select" | "insert" | "update" | "delete">;

type WorkItemRow = typeof workItems.$inferSelect;
type AssignmentRow = typeof reviewerAssignments.$inferSelect;
type WorkflowRow = typeof workflows.$inferSelect;
type AuditRow = typeof auditEntries.$inferSelect;
type CommentRow = typeof workItemComments.$inferSelect;

const MAX_PAGE = 1000;

function workflowKey(tenantId: string, projectId: string): SQL | undefined {
  return and(eq(workflows.tenantId, tenantId), eq(workflows.projectId, projectId));
}
const DEFAULT_AUDIT_PAGE = 50;

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

export function toWorkItem(row: WorkItemRow): WorkItem {
  const milestones: WorkItem["milestones"] = {};
  for (const key of MILESTONE_KEYS) {
    const at = row.milestones[key];
    if (at) milestones[key] = new Date(at);
  }

  return {
    id: row.id,
    tenantId: row.tenantId,
    projectId: row.projectId,
    key: row.key,
    title: row.title,
    status: row.status,
    ownerId: row.ownerId,
    ownerType: row.ownerType,
    archived: row.archived,
    archivedAt: row.archivedAt,
    milestones,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function toWorkItemRow(item: WorkItem): WorkItemRow {
  const milestones: WorkItemRow["milestones"] = {};
  for (const key of MILESTONE_KEYS) {
    const at = item.milestones[key];
    if (at) milestones[key] = at.toISOString();
  }

  return { ...item, milestones };
}

export function toAssignment(row: AssignmentRow): ReviewerAssignment {
  const { position, ...rest } = row;
  return { ...rest, order: position };
}

export function toWorkflow(row: WorkflowRow): WorkflowDefinition {
  return {
    projectId: row.projectId,
    name: row.name,
    statuses: row.statuses,
    rules: row.rules,
    ...(row.approval ? { approval: row.approval } : {}),
    updatedAt: row.updatedAt,
  };
}

export function toComment(row: CommentRow): WorkItemComment {
  const { seq: _seq, ...comment } = row;
  return comment;
}

function toAuditEntry(row: AuditRow): AuditEntry {
  const { seq: _seq, ...entry } = row;
  return Object.freeze({ ...entry, metadata: Object.freeze({ ...entry.metadata }) });
}

// ---------------------------------------------------------------------------
// Reader / transaction
// ---------------------------------------------------------------------------

class PgWorkflowReader implements WorkflowReader {
  constructor(
    protected readonly db: Executor,
    protected readonly tenantId: string
  ) {}

  async findItem(itemId: string): Promise<WorkItem | null> {
    const rows = await this.db
      .select()
      .from(workItems)
      .where(and(eq(workItems.tenantId, this.tenantId), eq(workItems.id, itemId)))
      .limit(1);
    const row = rows[0];
    return row ? toWorkItem(row) : null;
  }

  async listItems(filter: WorkItemFilter): Promise<WorkItem[]> {
    const conditions: SQL[] = [eq(workItems.tenantId, this.tenantId)];
    if (filter.projectId) conditions.push(eq(workItems.projectId, filter.projectId));
    if (filter.status) conditions.push(eq(workItems.status, filter.status));
    if (!filter.includeArchived) conditions.push(eq(workItems.archived, false));

    const rows = await this.db
      .select()
      .from(workItems)
      .where(and(...conditions))
      .orderBy(asc(workItems.createdAt))
      .limit(filter.limit ?? MAX_PAGE)
      .offset(filter.offset ?? 0);
    return rows.map(toWorkItem);
  }

  async listAssignments(itemId: string): Promise<ReviewerAssignment[]> {
    const rows = await this.db
      .select()
      .from(reviewerAssignments)
      .where(
        and(
          eq(reviewerAssignments.tenantId, this.tenantId),
          eq(reviewerAssignments.workItemId, itemId)
        )
      )
      .orderBy(asc(reviewerAssignments.position));
    return rows.map(toAssignment);
  }

  async findWorkflow(projectId: string): Promise<WorkflowDefinition | null> {
    const rows = await this.db
      .select()
      .from(workflows)
      .where(workflowKey(this.tenantId, projectId))
      .limit(1);
    const row = rows[0];
    return row ? toWorkflow(row) : null;
  }

  async listAudit(query: AuditQuery): Promise<AuditQueryResult> {
    const conditions: SQL[] = [eq(auditEntries.tenantId, this.tenantId)];
    if (query.actorId) conditions.push(eq(auditEntries.actorId, query.actorId));
    if (query.action) conditions.push(eq(auditEntries.action, query.action));
    if (query.entityType) conditions.push(eq(auditEntries.entityType, query.entityType));
    if (query.workItemId) conditions.push(eq(auditEntries.workItemId, query.workItemId));
    if (query.dateFrom) conditions.push(gte(auditEntries.createdAt, query.dateFrom));
    if (query.dateTo) conditions.push(lte(auditEntries.createdAt, query.dateTo));
    const where = and(...conditions);

    const [totals, rows] = await Promise.all([
      this.db.select({ value: count() }).from(auditEntries).where(where),
      this.db
        .select()
        .from(auditEntries)
        .where(where)
        .orderBy(desc(auditEntries.createdAt), desc(auditEntries.seq))
        .limit(query.limit ?? DEFAULT_AUDIT_PAGE)
        .offset(query.offset ?? 0),
    ]);

    return { data: rows.map(toAuditEntry), total: totals[0]?.value ?? 0 };
  }

  async listComments(itemId: string): Promise<WorkItemComment[]> {
    const rows = await this.db
      .select()
      .from(workItemComments)
      .where(
        and(eq(workItemComments.tenantId, this.tenantId), eq(workItemComments.workItemId, itemId))
      )
      .orderBy(asc(workItemComments.createdAt), asc(workItemComments.seq));
    return rows.map(toComment);
  }
}

class PgWorkflowTransaction extends PgWorkflowReader implements WorkflowTransaction {
  /** Shared row lock until commit; blocks a concurrent reconfiguration. */
  async findWorkflow(projectId: string): Promise<WorkflowDefinition | null> {
    const rows = await this.db
      .select()
      .from(workflows)
      .where(workflowKey(this.tenantId, projectId))
      .limit(1)
      .for("share");
    const row = rows[0];
    return row ? toWorkflow(row) : null;
  }

  async insertItem(item: WorkItem): Promise<void> {
    await this.db.insert(workItems).values(toWorkItemRow(this.own(item)));
  }

  async updateItem(item: WorkItem): Promise<void> {
    const { id, tenantId: _tenantId, createdAt: _createdAt, ...changes } = toWorkItemRow(item);
    const updated = await this.db
      .update(workItems)
      .set(changes)
      .where(and(eq(workItems.tenantId, this.tenantId), eq(workItems.id, id)))
      .returning({ id: workItems.id });
    if (updated.length === 0) {
      throw new PersistenceError(`Work item "${id}" does not exist`);
    }
  }

  async insertAssignment(assignment: ReviewerAssignment): Promise<void> {
    const { order, ...rest } = this.own(assignment);
    await this.db.insert(reviewerAssignments).values({ ...rest, position: order });
  }

  async updateAssignment(assignment: ReviewerAssignment): Promise<void> {
    await this.db
      .update(reviewerAssignments)
      .set({
        state: assignment.state,
        decidedAt: assignment.decidedAt,
        note: assignment.note,
        position: assignment.order,
      })
      .where(
        and(
          eq(reviewerAssignments.tenantId, this.tenantId),
          eq(reviewerAssignments.id, assignment.id)
        )
      );
  }

  async deleteAssignment(assignmentId: string): Promise<void> {
    await this.db
      .delete(reviewerAssignments)
      .where(
        and(
          eq(reviewerAssignments.tenantId, this.tenantId),
          eq(reviewerAssignments.id, assignmentId)
        )
      );
  }

  async saveWorkflow(definition: WorkflowDefinition): Promise<void> {
    const values = {
      name: definition.name,
      statuses: definition.statuses,
      rules: definition.rules,
      approval: definition.approval ?? null,
      updatedAt: definition.updatedAt ?? new Date(),
    };

    await this.db
      .insert(workflows)
      .values({ tenantId: this.tenantId, projectId: definition.projectId, ...values })
      .onConflictDoUpdate({ target: [workflows.tenantId, workflows.projectId], set: values });
  }

  async insertComment(comment: WorkItemComment): Promise<void> {
    await this.db.insert(workItemComments).values(this.own(comment));
  }

  async appendAudit(entry: AuditEntry): Promise<void> {
    await this.db.insert(auditEntries).values({ ...this.own(entry), metadata: { ...entry.metadata } });
  }

  /** Refuses rows addressed to another tenant. */
  private own<T extends { tenantId: string }>(row: T): T {
    if (row.tenantId !== this.tenantId) {
      throw new PersistenceError(
        `Refusing to write a row of tenant "${row.tenantId}" in a "${this.tenantId}" transaction`
      );
    }
    return row;
  }
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

type RowLock = { kind: "item"; itemId: string } | { kind: "workflow"; projectId: string };

export class PostgresWorkflowStore implements WorkflowStore {
  constructor(private readonly db: Database) {}

  reader(tenantId: string): WorkflowReader {
    return new PgWorkflowReader(this.db, tenantId);
  }

  transaction<T>(tenantId: string, work: (tx: WorkflowTransaction) => Promise<T>): Promise<T> {
    return this.run(tenantId, null, work);
  }

  withItemLock<T>(
    tenantId: string,
    itemId: string,
    work: (tx: WorkflowTransaction) => Promise<T>
  ): Promise<T> {
    return this.run(tenantId, { kind: "item", itemId }, work);
  }

  withWorkflowLock<T>(
    tenantId: string,
    projectId: string,
    work: (tx: WorkflowTransaction) => Promise<T>
  ): Promise<T> {
    return this.run(tenantId, { kind: "workflow", projectId }, work);
  }

  private async run<T>(
    tenantId: string,
    lock: RowLock | null,
    work: (tx: WorkflowTransaction) => Promise<T>
  ): Promise<T> {
    try {
      return await this.db.transaction(async (tx) => {
        if (lock?.kind === "item") {
          await tx
            .select({ id: workItems.id })
            .from(workItems)
            .where(and(eq(workItems.tenantId, tenantId), eq(workItems.id, lock.itemId)))
            .for("update");
        } else if (lock?.kind === "workflow") {
          await tx
            .select({ id: workflows.id })
            .from(workflows)
            .where(workflowKey(tenantId, lock.projectId))
            .for("update");
        }
        return work(new PgWorkflowTransaction(tx, tenantId));
      });
    } catch (error) {
      if (error instanceof PlatformError) throw error;
      throw new PersistenceError("Database transaction failed", { cause: error });
    }
  }
}
