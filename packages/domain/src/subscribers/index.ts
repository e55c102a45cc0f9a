/**
 * Domain Event Subscribers
 *
 * Reactive logic that responds to work item events after their
 * transaction has committed. This is the seam where notification
 * dispatch (email, websocket push) plugs in; the subscribers here record
 * what a dispatcher would act on.
 *
 * Subscribers run asynchronously — a failing subscriber never breaks the
 * operation that emitted the event.
 */

import { WORK_ITEM_EVENTS, type EventSubscriber, type Logger } from "@workgate/contracts";

/**
 * Builds the subscribers over the logger the platform provides.
 */
export function createEventSubscribers(logger: Logger): EventSubscriber[] {
  /**
   * Logs every status change. Automatic moves made by the review outcome
   * are called out separately, since the owner did not trigger them.
   */
  const onStatusChanged: EventSubscriber = {
    eventType: WORK_ITEM_EVENTS.statusChanged,
    name: "LogStatusChange",
    async handler(event) {
      const { tenantId, workItemId, from, to, actorId, origin } = event.payload;
      const message =
        origin === "approval" ? "Work item moved by review outcome" : "Work item moved";
      logger.info(message, { tenantId, workItemId, from, to, actorId });
    },
  };

  /** Rejections are the decisions an owner must act on. */
  const onDecisionRecorded: EventSubscriber = {
    eventType: WORK_ITEM_EVENTS.decisionRecorded,
    name: "LogReviewDecision",
    async handler(event) {
      const { tenantId, workItemId, reviewerId, decision, note } = event.payload;
      if (decision === "rejected") {
        logger.warn("Review rejected", { tenantId, workItemId, reviewerId, note });
      } else {
        logger.info("Review approved", { tenantId, workItemId, reviewerId });
      }
    },
  };

  const onReviewerAssigned: EventSubscriber = {
    eventType: WORK_ITEM_EVENTS.reviewerAssigned,
    name: "LogReviewerAssigned",
    async handler(event) {
      logger.info("Reviewer assigned", event.payload);
    },
  };

  /** Comments reach the item's owner and reviewers once a dispatcher exists. */
  const onCommentAdded: EventSubscriber = {
    eventType: WORK_ITEM_EVENTS.commentAdded,
    name: "LogComment",
    async handler(event) {
      const { tenantId, workItemId, commentId, authorId } = event.payload;
      logger.info("Comment added", { tenantId, workItemId, commentId, authorId });
    },
  };

  /**
   * Wildcard subscriber for the remaining lifecycle events.
   */
  const onLifecycle: EventSubscriber = {
    eventType: "*",
    name: "LogItemLifecycle",
    async handler(event) {
      if (event.type !== WORK_ITEM_EVENTS.created && event.type !== WORK_ITEM_EVENTS.archived) {
        return;
      }
      logger.info(`Event ${event.type}`, event.payload);
    },
  };

  return [onStatusChanged, onDecisionRecorded, onReviewerAssigned, onCommentAdded, onLifecycle];
}
