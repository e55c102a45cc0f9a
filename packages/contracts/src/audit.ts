/**
 * Audit Trail
 *
 * One immutable entry per state-changing action. Entries are written inside
 * the same transaction as the change they describe and are never updated or
 * deleted afterwards.
 */

export const AUDIT_ACTIONS = [
  "ItemCreated",
  "StatusChange",
  "ItemArchived",
  "ReviewerAssigned",
  "ReviewerUnassigned",
  "ReviewerApproved",
  "ReviewerRejected",
  "ReviewerReset",
  "WorkflowConfigured",
  "CommentAdded",
] as const;

export type AuditAction = (typeof AUDIT_ACTIONS)[number];

export const AUDIT_ENTITY_TYPES = [
  "WorkItem",
  "ReviewerAssignment",
  "Workflow",
  "Comment",
] as const;

export type AuditEntityType = (typeof AUDIT_ENTITY_TYPES)[number];

export interface AuditEntry {
  readonly id: string;
  readonly tenantId: string;
  readonly actorId: string;
  readonly action: AuditAction;
  readonly entityType: AuditEntityType;
  readonly entityId: string;

  /** The work item the entry concerns, for per-item timelines */
  readonly workItemId: string | null;

  readonly previousValue: string | null;
  readonly newValue: string | null;
  readonly note: string | null;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly createdAt: Date;
}

/** What a component supplies; the recorder adds id and timestamp. */
export type AuditDraft = Omit<AuditEntry, "id" | "createdAt">;

export interface AuditQuery {
  actorId?: string;
  action?: AuditAction;
  entityType?: AuditEntityType;
  workItemId?: string;
  dateFrom?: Date;
  dateTo?: Date;
  limit?: number;
  offset?: number;
}

export interface AuditQueryResult {
  data: AuditEntry[];
  total: number;
}
