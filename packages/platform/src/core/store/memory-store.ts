/**
 * In-Memory Workflow Store
 *
 * A WorkflowStore kept in process memory, with the same guarantees the
 * PostgreSQL store gives:
 *
 *   - Writes are staged on the transaction and applied together only when
 *     the work function resolves; a throw discards all of them
 *   - withItemLock serializes work per (tenant, item) through a KeyedMutex
 *   - Reading a workflow inside a transaction takes the (tenant, project)
 *     key until commit; withWorkflowLock takes it up front
 *   - Readers and transactions only see their own tenant
 *   - Values are copied on the way in and out, so callers never alias
 *     stored state
 *
 * Used by the test suites and by the API when DATABASE_URL is not set.
 * `failOn()` makes the next matching write throw a PersistenceError, which
 * is how tests exercise rollback.
 */

import type {
  AuditEntry,
  AuditQuery,
  AuditQueryResult,
  ReviewerAssignment,
  WorkflowDefinition,
  WorkflowReader,
  WorkflowStore,
  WorkflowTransaction,
  WorkItem,
  WorkItemComment,
  WorkItemFilter,
} from "@workgate/contracts";
import { PersistenceError } from "../errors/index.js";
import { KeyedMutex } from "./keyed-mutex.js";

export type MemoryWriteOperation =
  | "insertItem"
  | "updateItem"
  | "insertAssignment"
  | "updateAssignment"
  | "deleteAssignment"
  | "saveWorkflow"
  | "insertComment"
  | "appendAudit";

interface TenantState {
  items: Map<string, WorkItem>;
  assignments: Map<string, ReviewerAssignment>;
  workflows: Map<string, WorkflowDefinition>;
  comments: WorkItemComment[];
  audit: AuditEntry[];
}

function emptyState(): TenantState {
  return {
    items: new Map(),
    assignments: new Map(),
    workflows: new Map(),
    comments: [],
    audit: [],
  };
}

const DEFAULT_PAGE_SIZE = 50;

function workflowKey(tenantId: string, projectId: string): string {
  return `workflow:${tenantId}:${projectId}`;
}

export class MemoryWorkflowStore implements WorkflowStore {
  private readonly tenants = new Map<string, TenantState>();
  private readonly locks = new KeyedMutex();
  private readonly pendingFailures = new Set<MemoryWriteOperation>();

  reader(tenantId: string): WorkflowReader {
    return new MemoryTransaction(this.state(tenantId), () => undefined, async () => undefined);
  }

  async transaction<T>(
    tenantId: string,
    work: (tx: WorkflowTransaction) => Promise<T>
  ): Promise<T> {
    return this.run(tenantId, null, work);
  }

  async withItemLock<T>(
    tenantId: string,
    itemId: string,
    work: (tx: WorkflowTransaction) => Promise<T>
  ): Promise<T> {
    return this.locks.runExclusive(`item:${tenantId}:${itemId}`, () =>
      this.run(tenantId, null, work)
    );
  }

  async withWorkflowLock<T>(
    tenantId: string,
    projectId: string,
    work: (tx: WorkflowTransaction) => Promise<T>
  ): Promise<T> {
    return this.locks.runExclusive(workflowKey(tenantId, projectId), () =>
      this.run(tenantId, projectId, work)
    );
  }

  /**
   * One transaction. Workflow keys taken while it runs are released after
   * commit or rollback; `heldProjectId` is already held by the caller.
   */
  private async run<T>(
    tenantId: string,
    heldProjectId: string | null,
    work: (tx: WorkflowTransaction) => Promise<T>
  ): Promise<T> {
    const acquired = new Map<string, Promise<void>>();
    const releases: (() => void)[] = [];
    if (heldProjectId) acquired.set(heldProjectId, Promise.resolve());

    const lockWorkflow = (projectId: string): Promise<void> => {
      let pending = acquired.get(projectId);
      if (!pending) {
        pending = this.locks.acquire(workflowKey(tenantId, projectId)).then((release) => {
          releases.push(release);
        });
        acquired.set(projectId, pending);
      }
      return pending;
    };

    const tx = new MemoryTransaction(
      this.state(tenantId),
      (operation) => this.takeFailure(operation),
      lockWorkflow
    );
    try {
      const result = await work(tx);
      tx.commit();
      return result;
    } finally {
      await Promise.allSettled(acquired.values());
      for (const release of releases) release();
    }
  }

  /** The next write of this kind throws PersistenceError. One-shot. */
  failOn(operation: MemoryWriteOperation): void {
    this.pendingFailures.add(operation);
  }

  private takeFailure(operation: MemoryWriteOperation): void {
    if (this.pendingFailures.delete(operation)) {
      throw new PersistenceError(`Simulated storage failure during ${operation}`);
    }
  }

  private state(tenantId: string): TenantState {
    let state = this.tenants.get(tenantId);
    if (!state) {
      state = emptyState();
      this.tenants.set(tenantId, state);
    }
    return state;
  }
}

// ---------------------------------------------------------------------------
// Transaction
// ---------------------------------------------------------------------------

class MemoryTransaction implements WorkflowTransaction {
  private readonly stagedItems = new Map<string, WorkItem>();
  /** null marks a deleted assignment */
  private readonly stagedAssignments = new Map<string, ReviewerAssignment | null>();
  private readonly stagedWorkflows = new Map<string, WorkflowDefinition>();
  private readonly stagedComments: WorkItemComment[] = [];
  private readonly stagedAudit: AuditEntry[] = [];
  private committed = false;

  constructor(
    private readonly state: TenantState,
    private readonly beforeWrite: (operation: MemoryWriteOperation) => void,
    private readonly lockWorkflow: (projectId: string) => Promise<void>
  ) {}

  // -- Reads ---------------------------------------------------------------

  async findItem(itemId: string): Promise<WorkItem | null> {
    const item = this.stagedItems.get(itemId) ?? this.state.items.get(itemId);
    return item ? structuredClone(item) : null;
  }

  async listItems(filter: WorkItemFilter): Promise<WorkItem[]> {
    const merged = new Map(this.state.items);
    for (const [id, item] of this.stagedItems) merged.set(id, item);

    const matching = [...merged.values()]
      .filter((item) => !filter.projectId || item.projectId === filter.projectId)
      .filter((item) => !filter.status || item.status === filter.status)
      .filter((item) => filter.includeArchived || !item.archived)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());

    const offset = filter.offset ?? 0;
    const limit = filter.limit ?? matching.length;
    return matching.slice(offset, offset + limit).map((item) => structuredClone(item));
  }

  async listAssignments(itemId: string): Promise<ReviewerAssignment[]> {
    const merged = new Map(this.state.assignments);
    for (const [id, assignment] of this.stagedAssignments) {
      if (assignment) merged.set(id, assignment);
      else merged.delete(id);
    }

    return [...merged.values()]
      .filter((assignment) => assignment.workItemId === itemId)
      .sort((a, b) => a.order - b.order)
      .map((assignment) => structuredClone(assignment));
  }

  async findWorkflow(projectId: string): Promise<WorkflowDefinition | null> {
    await this.lockWorkflow(projectId);
    const definition =
      this.stagedWorkflows.get(projectId) ?? this.state.workflows.get(projectId);
    return definition ? structuredClone(definition) : null;
  }

  async listAudit(query: AuditQuery): Promise<AuditQueryResult> {
    const newestFirst = [...this.state.audit, ...this.stagedAudit].reverse();

    const matching = newestFirst.filter(
      (entry) =>
        (!query.actorId || entry.actorId === query.actorId) &&
        (!query.action || entry.action === query.action) &&
        (!query.entityType || entry.entityType === query.entityType) &&
        (!query.workItemId || entry.workItemId === query.workItemId) &&
        (!query.dateFrom || entry.createdAt >= query.dateFrom) &&
        (!query.dateTo || entry.createdAt <= query.dateTo)
    );

    const offset = query.offset ?? 0;
    const limit = query.limit ?? DEFAULT_PAGE_SIZE;
    return { data: matching.slice(offset, offset + limit), total: matching.length };
  }

  async listComments(itemId: string): Promise<WorkItemComment[]> {
    return [...this.state.comments, ...this.stagedComments]
      .filter((comment) => comment.workItemId === itemId)
      .map((comment) => structuredClone(comment));
  }

  // -- Writes --------------------------------------------------------------

  async insertItem(item: WorkItem): Promise<void> {
    this.beforeWrite("insertItem");
    if (this.stagedItems.has(item.id) || this.state.items.has(item.id)) {
      throw new PersistenceError(`Work item "${item.id}" already exists`);
    }
    this.stagedItems.set(item.id, structuredClone(item));
  }

  async updateItem(item: WorkItem): Promise<void> {
    this.beforeWrite("updateItem");
    if (!this.stagedItems.has(item.id) && !this.state.items.has(item.id)) {
      throw new PersistenceError(`Work item "${item.id}" does not exist`);
    }
    this.stagedItems.set(item.id, structuredClone(item));
  }

  async insertAssignment(assignment: ReviewerAssignment): Promise<void> {
    this.beforeWrite("insertAssignment");
    const current = await this.listAssignments(assignment.workItemId);
    if (current.some((a) => a.reviewerId === assignment.reviewerId)) {
      throw new PersistenceError(
        `Reviewer "${assignment.reviewerId}" is already assigned to "${assignment.workItemId}"`
      );
    }
    this.stagedAssignments.set(assignment.id, structuredClone(assignment));
  }

  async updateAssignment(assignment: ReviewerAssignment): Promise<void> {
    this.beforeWrite("updateAssignment");
    this.stagedAssignments.set(assignment.id, structuredClone(assignment));
  }

  async deleteAssignment(assignmentId: string): Promise<void> {
    this.beforeWrite("deleteAssignment");
    this.stagedAssignments.set(assignmentId, null);
  }

  async saveWorkflow(definition: WorkflowDefinition): Promise<void> {
    this.beforeWrite("saveWorkflow");
    this.stagedWorkflows.set(definition.projectId, structuredClone(definition));
  }

  async insertComment(comment: WorkItemComment): Promise<void> {
    this.beforeWrite("insertComment");
    this.stagedComments.push(structuredClone(comment));
  }

  async appendAudit(entry: AuditEntry): Promise<void> {
    this.beforeWrite("appendAudit");
    this.stagedAudit.push(entry);
  }

  /** Applies every staged write. Called once, after the work resolved. */
  commit(): void {
    if (this.committed) {
      throw new PersistenceError("Transaction already committed");
    }
    this.committed = true;

    for (const [id, item] of this.stagedItems) this.state.items.set(id, item);
    for (const [id, assignment] of this.stagedAssignments) {
      if (assignment) this.state.assignments.set(id, assignment);
      else this.state.assignments.delete(id);
    }
    for (const [id, definition] of this.stagedWorkflows) this.state.workflows.set(id, definition);
    this.state.comments.push(...this.stagedComments);
    this.state.audit.push(...this.stagedAudit);
  }
}
