/**
 * Event Bus — Test Suite
 *
 *   - exact and wildcard subscriptions
 *   - timestamps added on publish
 *   - a failing subscriber is logged and never reaches the publisher
 *   - the post-commit sink publishes each event and logs rejected publishes
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import type { DomainEvent, EventSubscriber, Logger } from "@workgate/contracts";
import {
  clearSubscribers,
  createEventSink,
  getSubscriberCount,
  publish,
  subscribe,
  subscribeAll,
} from "./index.js";
import { resetObservability, setObservabilityProvider } from "../observability/index.js";

function statusChanged(to = "approved"): DomainEvent {
  return {
    type: "workItem.status_changed",
    payload: { workItemId: "item-1", from: "in_review", to },
  };
}

function subscriber(
  eventType: string,
  name: string,
  handler: EventSubscriber["handler"] = async () => {}
): EventSubscriber {
  return { eventType, name, handler };
}

beforeEach(() => {
  clearSubscribers();
  resetObservability();
});

// ---------------------------------------------------------------------------
// Routing
// ---------------------------------------------------------------------------

describe("publish", () => {
  it("reaches exact and wildcard subscribers only", async () => {
    const exact = vi.fn(async () => {});
    const wildcard = vi.fn(async () => {});
    const other = vi.fn(async () => {});
    subscribeAll([
      subscriber("workItem.status_changed", "exact", exact),
      subscriber("*", "audit-mirror", wildcard),
      subscriber("workItem.archived", "other", other),
    ]);

    await publish(statusChanged());

    expect(exact).toHaveBeenCalledOnce();
    expect(wildcard).toHaveBeenCalledOnce();
    expect(other).not.toHaveBeenCalled();
    expect(getSubscriberCount()).toBe(3);
  });

  it("adds a timestamp unless one is set", async () => {
    const seen: DomainEvent[] = [];
    subscribe(subscriber("*", "collect", async (event) => {
      seen.push(event);
    }));
    const at = new Date("2026-03-02T08:00:00Z");

    await publish(statusChanged());
    await publish({ ...statusChanged(), timestamp: at });

    expect(seen[0]?.timestamp).toBeInstanceOf(Date);
    expect(seen[1]?.timestamp).toBe(at);
  });

  it("isolates a failing subscriber", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const captureException = vi.fn();
    setObservabilityProvider({
      name: "mock",
      captureException,
      captureMessage: vi.fn(),
      flush: vi.fn(async () => {}),
    });
    const healthy = vi.fn(async () => {});
    subscribe(subscriber("workItem.status_changed", "notify-owner", async () => {
      throw new Error("mail server down");
    }));
    subscribe(subscriber("workItem.status_changed", "metrics", healthy));

    await expect(publish(statusChanged())).resolves.toBeUndefined();

    expect(healthy).toHaveBeenCalledOnce();
    expect(captureException).toHaveBeenCalledWith(expect.any(Error), {
      workItemId: "item-1",
      subscriber: "notify-owner",
      eventType: "workItem.status_changed",
    });
  });
});

// ---------------------------------------------------------------------------
// Post-commit sink
// ---------------------------------------------------------------------------

describe("createEventSink", () => {
  function fakeLogger(): Logger {
    return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  }

  it("publishes every event in order", () => {
    const published: string[] = [];
    const sink = createEventSink(fakeLogger(), async (event) => {
      published.push(String(event.payload.to));
    });

    sink([statusChanged("rejected"), statusChanged("draft")]);

    expect(published).toEqual(["rejected", "draft"]);
  });

  it("logs a rejected publish instead of throwing", async () => {
    const logger = fakeLogger();
    const sink = createEventSink(logger, async () => {
      throw new Error("bus unavailable");
    });

    expect(() => sink([statusChanged()])).not.toThrow();
    await vi.waitFor(() => {
      expect(logger.error).toHaveBeenCalledWith("Event publish failed", {
        eventType: "workItem.status_changed",
        error: "bus unavailable",
      });
    });
  });
});
