/**
 * Event Bus
 *
 * Routes DomainEvents to registered EventSubscriber handlers. This is the
 * seam where notification dispatch (email, websocket push) plugs in.
 *
 *   - Subscribers are registered at startup (not dynamically at runtime)
 *   - Events are published only after the producing transaction commits
 *   - A failing subscriber is logged and never reaches the producer
 *   - Supports exact match ("workItem.archived") and wildcard ("*") subscriptions
 */

import type { DomainEvent, EventSubscriber, Logger } from "@workgate/contracts";
import { captureException, subjectTags } from "../observability/index.js";

/** All registered subscribers, keyed by event type */
const subscribers = new Map<string, EventSubscriber[]>();

/**
 * Register an event subscriber.
 * Call this at startup (apps/api bootstrap.ts).
 *
 * @param subscriber - The subscriber to register
 */
export function subscribe(subscriber: EventSubscriber): void {
  const existing = subscribers.get(subscriber.eventType) ?? [];
  existing.push(subscriber);
  subscribers.set(subscriber.eventType, existing);
}

/**
 * Register multiple subscribers at once.
 * Convenience wrapper for subscribe().
 */
export function subscribeAll(subs: EventSubscriber[]): void {
  for (const sub of subs) {
    subscribe(sub);
  }
}

/**
 * Publish a domain event to all matching subscribers.
 *
 * Matching rules:
 *   1. Exact match on event type (e.g., "workItem.archived" matches "workItem.archived")
 *   2. Wildcard "*" matches all events
 *
 * All matching handlers are invoked concurrently via Promise.allSettled.
 * Failed handlers are logged but never re-thrown — they don't break the
 * calling action.
 *
 * @param event - The domain event to publish
 */
export async function publish(event: DomainEvent): Promise<void> {
  // Add timestamp if not already set
  const enrichedEvent: DomainEvent = {
    ...event,
    timestamp: event.timestamp ?? new Date(),
  };

  // Collect matching subscribers
  const handlers: EventSubscriber[] = [];

  // Exact match
  const exact = subscribers.get(enrichedEvent.type);
  if (exact) handlers.push(...exact);

  // Wildcard match
  const wildcard = subscribers.get("*");
  if (wildcard) handlers.push(...wildcard);

  if (handlers.length === 0) return;

  // Execute all handlers concurrently, catching failures
  const results = await Promise.allSettled(
    handlers.map((sub) => sub.handler(enrichedEvent))
  );

  // Log failures (don't throw — event handlers must not break the emitter)
  for (let i = 0; i < results.length; i++) {
    const result = results[i];
    if (result.status === "rejected") {
      console.error(
        `[event-bus] Subscriber "${handlers[i].name}" failed for event "${enrichedEvent.type}":`,
        result.reason
      );
      // Capture subscriber failure in observability
      if (result.reason instanceof Error) {
        captureException(result.reason, {
          ...subjectTags(enrichedEvent.payload),
          subscriber: handlers[i].name,
          eventType: enrichedEvent.type,
        });
      }
    }
  }
}

/**
 * Returns the count of registered subscribers (for testing/debugging).
 */
export function getSubscriberCount(): number {
  let count = 0;
  for (const subs of subscribers.values()) {
    count += subs.length;
  }
  return count;
}

/**
 * Clears all registered subscribers.
 * Used for test isolation — prevents subscriber state from leaking between tests.
 */
export function clearSubscribers(): void {
  subscribers.clear();
}

// ---------------------------------------------------------------------------
// Post-commit dispatch
// ---------------------------------------------------------------------------

/** Hands committed events to the bus without waiting for subscribers. */
export type EventSink = (events: readonly DomainEvent[]) => void;

/**
 * Creates the sink core services call after commit. Each event is
 * published in the background; a rejected publish is logged.
 */
export function createEventSink(
  logger: Logger,
  publisher: (event: DomainEvent) => Promise<void> = publish
): EventSink {
  return (events) => {
    for (const event of events) {
      publisher(event).catch((error: unknown) => {
        logger.error("Event publish failed", {
          eventType: event.type,
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }
  };
}
