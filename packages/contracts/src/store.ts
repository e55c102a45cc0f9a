/**
 * Store Contract
 *
 * The persistence boundary of the engine. Every reader and transaction is
 * bound to one tenant at creation; nothing outside that tenant is visible
 * through it.
 *
 * Implementations must give all-or-nothing commits and an exclusive
 * per-item lock (row lock in PostgreSQL, keyed mutex in memory).
 *
 * A transaction that reads a workflow holds it until commit, so a
 * concurrent withWorkflowLock waits for it and the other way round. Lock
 * order is always item first, then workflow.
 */

import type { AuditEntry, AuditQuery, AuditQueryResult } from "./audit.js";
import type { ReviewerAssignment, WorkItem, WorkItemComment } from "./work-item.js";
import type { WorkflowDefinition } from "./workflow.js";

export interface WorkItemFilter {
  projectId?: string;
  status?: string;
  includeArchived?: boolean;
  limit?: number;
  offset?: number;
}

/** Read side, scoped to one tenant. */
export interface WorkflowReader {
  findItem(itemId: string): Promise<WorkItem | null>;
  listItems(filter: WorkItemFilter): Promise<WorkItem[]>;

  /** Assignments ordered by their `order` field */
  listAssignments(itemId: string): Promise<ReviewerAssignment[]>;

  /** Inside a transaction this also locks the workflow until commit */
  findWorkflow(projectId: string): Promise<WorkflowDefinition | null>;

  /** Newest first */
  listAudit(query: AuditQuery): Promise<AuditQueryResult>;

  /** Oldest first */
  listComments(itemId: string): Promise<WorkItemComment[]>;
}

/** Write side. Writes become visible to others only on commit. */
export interface WorkflowTransaction extends WorkflowReader {
  insertItem(item: WorkItem): Promise<void>;
  updateItem(item: WorkItem): Promise<void>;

  insertAssignment(assignment: ReviewerAssignment): Promise<void>;
  updateAssignment(assignment: ReviewerAssignment): Promise<void>;
  deleteAssignment(assignmentId: string): Promise<void>;

  saveWorkflow(definition: WorkflowDefinition): Promise<void>;

  insertComment(comment: WorkItemComment): Promise<void>;

  /** Append-only: there is no update or delete counterpart */
  appendAudit(entry: AuditEntry): Promise<void>;
}

export interface WorkflowStore {
  /** Lock-free snapshot reads */
  reader(tenantId: string): WorkflowReader;

  /** Runs `work` in one transaction; a throw rolls back every write. */
  transaction<T>(
    tenantId: string,
    work: (tx: WorkflowTransaction) => Promise<T>
  ): Promise<T>;

  /**
   * Like transaction(), but first takes the item's exclusive lock and holds
   * it until commit or rollback.
   */
  withItemLock<T>(
    tenantId: string,
    itemId: string,
    work: (tx: WorkflowTransaction) => Promise<T>
  ): Promise<T>;

  /**
   * Like transaction(), but first takes the project workflow's exclusive
   * lock. Transactions that read the workflow wait until commit.
   */
  withWorkflowLock<T>(
    tenantId: string,
    projectId: string,
    work: (tx: WorkflowTransaction) => Promise<T>
  ): Promise<T>;
}
