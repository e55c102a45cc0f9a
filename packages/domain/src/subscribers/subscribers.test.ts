/**
 * Event Subscribers — Test Suite
 *
 * Each subscriber reacts only to its event and logs through the logger it
 * was built with.
 */

import { describe, it, expect, vi } from "vitest";
import { WORK_ITEM_EVENTS, type DomainEvent, type Logger } from "@workgate/contracts";
import { createEventSubscribers } from "./index.js";

function setup() {
  const logger: Logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  const subscribers = createEventSubscribers(logger);

  /** Delivers the event the way the event bus does: exact type or "*". */
  async function deliver(event: DomainEvent): Promise<void> {
    for (const subscriber of subscribers) {
      if (subscriber.eventType === event.type || subscriber.eventType === "*") {
        await subscriber.handler(event);
      }
    }
  }

  return { logger, subscribers, deliver };
}

describe("createEventSubscribers", () => {
  it("registers one subscriber per concern with unique names", () => {
    const names = setup().subscribers.map((s) => s.name);
    expect(new Set(names).size).toBe(names.length);
  });

  it("logs manual status changes", async () => {
    const { logger, deliver } = setup();

    await deliver({
      type: WORK_ITEM_EVENTS.statusChanged,
      payload: {
        tenantId: "tenant-a",
        workItemId: "item-1",
        from: "draft",
        to: "submitted",
        actorId: "alice",
        origin: "manual",
      },
    });

    expect(logger.info).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith("Work item moved", {
      tenantId: "tenant-a",
      workItemId: "item-1",
      from: "draft",
      to: "submitted",
      actorId: "alice",
    });
  });

  it("calls out moves made by the review outcome", async () => {
    const { logger, deliver } = setup();

    await deliver({
      type: WORK_ITEM_EVENTS.statusChanged,
      payload: { tenantId: "tenant-a", workItemId: "item-1", from: "in_review", to: "approved", actorId: "bob", origin: "approval" },
    });

    expect(logger.info).toHaveBeenCalledWith("Work item moved by review outcome", expect.objectContaining({ to: "approved" }));
  });

  it("warns on rejections", async () => {
    const { logger, deliver } = setup();

    await deliver({
      type: WORK_ITEM_EVENTS.decisionRecorded,
      payload: { tenantId: "tenant-a", workItemId: "item-1", reviewerId: "carol", decision: "rejected", note: "Receipt missing" },
    });

    expect(logger.warn).toHaveBeenCalledWith("Review rejected", {
      tenantId: "tenant-a",
      workItemId: "item-1",
      reviewerId: "carol",
      note: "Receipt missing",
    });
    expect(logger.info).not.toHaveBeenCalled();
  });

  it("logs comments without their content", async () => {
    const { logger, deliver } = setup();

    await deliver({
      type: WORK_ITEM_EVENTS.commentAdded,
      payload: { tenantId: "tenant-a", workItemId: "item-1", commentId: "c-1", authorId: "dave" },
    });

    expect(logger.info).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith("Comment added", {
      tenantId: "tenant-a",
      workItemId: "item-1",
      commentId: "c-1",
      authorId: "dave",
    });
  });

  it("logs created and archived items through the wildcard subscriber", async () => {
    const { logger, deliver } = setup();

    await deliver({ type: WORK_ITEM_EVENTS.archived, payload: { workItemId: "item-2" } });

    expect(logger.info).toHaveBeenCalledWith("Event workItem.archived", { workItemId: "item-2" });
  });

  it("ignores unrelated events", async () => {
    const { logger, deliver } = setup();

    await deliver({ type: "billing.invoice_paid", payload: {} });

    expect(logger.info).not.toHaveBeenCalled();
    expect(logger.warn).not.toHaveBeenCalled();
  });
});
