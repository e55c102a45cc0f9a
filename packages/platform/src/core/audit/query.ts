/**
 * Audit Trail Query
 *
 * Tenant-scoped, paginated reads of the audit trail, plus the per-item
 * timeline view built from the same entries.
 *
 * The write side lives in index.ts (AuditRecorder). This module handles reads.
 */

import type {
  AuditEntry,
  AuditQuery,
  AuditQueryResult,
  WorkflowReader,
} from "@workgate/contracts";

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 200;

/**
 * Query the audit trail with filters and pagination, newest first.
 * The reader is already bound to one tenant.
 */
export async function queryAuditTrail(
  reader: WorkflowReader,
  query: AuditQuery
): Promise<AuditQueryResult> {
  const limit = Math.min(Math.max(query.limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);
  const offset = Math.max(query.offset ?? 0, 0);

  return reader.listAudit({ ...query, limit, offset });
}

// ---------------------------------------------------------------------------
// Timeline
// ---------------------------------------------------------------------------

export interface TimelineEvent {
  at: Date;
  actorId: string;
  action: AuditEntry["action"];
  summary: string;
  note: string | null;
}

function summarize(entry: AuditEntry): string {
  switch (entry.action) {
    case "ItemCreated":
      return `Created in "${entry.newValue}"`;
    case "StatusChange":
      return entry.metadata.origin === "approval"
        ? `Moved from "${entry.previousValue}" to "${entry.newValue}" by review outcome`
        : `Moved from "${entry.previousValue}" to "${entry.newValue}"`;
    case "ItemArchived":
      return "Archived";
    case "ReviewerAssigned":
      return `Reviewer ${entry.newValue} assigned`;
    case "ReviewerUnassigned":
      return `Reviewer ${entry.previousValue} unassigned`;
    case "ReviewerApproved":
      return `${entry.actorId} approved`;
    case "ReviewerRejected":
      return `${entry.actorId} rejected`;
    case "ReviewerReset":
      return `Review by ${String(entry.metadata.reviewerId)} reset to pending`;
    case "WorkflowConfigured":
      return `Workflow "${entry.newValue}" configured`;
    case "CommentAdded":
      return `${entry.actorId} commented`;
  }
}

/**
 * Orders one item's audit entries oldest first and describes each step.
 */
export function buildItemTimeline(entries: readonly AuditEntry[]): TimelineEvent[] {
  return entries
    .map((entry, index) => ({ entry, index }))
    .sort(
      (a, b) =>
        a.entry.createdAt.getTime() - b.entry.createdAt.getTime() ||
        // Same timestamp: input is newest first, so a higher index is older
        b.index - a.index
    )
    .map(({ entry }) => ({
      at: entry.createdAt,
      actorId: entry.actorId,
      action: entry.action,
      summary: summarize(entry),
      note: entry.note,
    }));
}
