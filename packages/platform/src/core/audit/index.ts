/**
 * Audit Recorder
 *
 * Appends immutable AuditEntry records inside the caller's transaction.
 * The entry commits together with the change it describes, or not at all:
 * a failed audit write aborts the whole operation.
 */

import type { AuditDraft, AuditEntry, WorkflowTransaction } from "@workgate/contracts";

export { queryAuditTrail, buildItemTimeline, type TimelineEvent } from "./query.js";

/** Source of "now"; injected so tests can pin timestamps */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export class AuditRecorder {
  constructor(private readonly clock: Clock = systemClock) {}

  async record(tx: WorkflowTransaction, draft: AuditDraft): Promise<AuditEntry> {
    const entry: AuditEntry = Object.freeze({
      ...draft,
      id: crypto.randomUUID(),
      metadata: Object.freeze({ ...draft.metadata }),
      createdAt: this.clock(),
    });

    await tx.appendAudit(entry);
    return entry;
  }
}
