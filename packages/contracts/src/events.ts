/**
 * Work Item Events
 *
 * Published on the event bus after the transaction that produced them has
 * committed. Subscribers (notifications, websockets, integrations) react to
 * them; the engine never waits for their outcome.
 */

import type { DomainEvent } from "./context.js";
import type { ReviewDecision } from "./work-item.js";

export const WORK_ITEM_EVENTS = {
  created: "workItem.created",
  statusChanged: "workItem.status_changed",
  archived: "workItem.archived",
  reviewerAssigned: "workItem.reviewer_assigned",
  reviewerUnassigned: "workItem.reviewer_unassigned",
  decisionRecorded: "workItem.reviewer_decision_recorded",
  commentAdded: "workItem.comment_added",
} as const;

export type WorkItemEventType = (typeof WORK_ITEM_EVENTS)[keyof typeof WORK_ITEM_EVENTS];

/** Payload of "workItem.status_changed" */
export interface ItemStatusChangedPayload {
  [key: string]: unknown;
  tenantId: string;
  workItemId: string;
  from: string;
  to: string;
  actorId: string;
  /** "approval" when the aggregator moved the item */
  origin: "manual" | "approval";
}

/** Payload of "workItem.reviewer_decision_recorded" */
export interface ReviewerDecisionRecordedPayload {
  [key: string]: unknown;
  tenantId: string;
  workItemId: string;
  reviewerId: string;
  decision: ReviewDecision;
  note: string | null;
}

export function itemStatusChanged(payload: ItemStatusChangedPayload): DomainEvent {
  return { type: WORK_ITEM_EVENTS.statusChanged, payload };
}

export function reviewerDecisionRecorded(
  payload: ReviewerDecisionRecordedPayload
): DomainEvent {
  return { type: WORK_ITEM_EVENTS.decisionRecorded, payload };
}
