/**
 * Action Context
 *
 * Provided by the platform to every action execution.
 * Contains what an action needs to do its work: the resolved tenant
 * context (tenant, principal, effective role) and a logger.
 *
 * The domain NEVER constructs this — the platform does.
 */

import type { CallerType } from "./permission.js";
import type { TenantContext } from "./tenant.js";

/**
 * Identifies who or what is executing an action, as the edge saw it.
 * The tenant is only a request here; the resolver decides.
 */
export interface Caller {
  /** Unique user identifier */
  userId: string;

  /** What kind of caller this is */
  type: CallerType;

  /** Tenant the caller asked to act in; omitted means "my default" */
  tenantId?: string;
}

/**
 * Structured logger provided to actions.
 * Actions should use this instead of console.log.
 */
export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

/**
 * A domain event emitted after a transaction commits.
 * Platform routes these to subscribers.
 */
export interface DomainEvent {
  /** Event name. Convention: "entity.verb_past_tense" (e.g., "workItem.archived") */
  type: string;

  /** The data associated with this event */
  payload: Record<string, unknown>;

  /** When the event occurred */
  timestamp?: Date;
}

/**
 * An event subscriber — a function that reacts to domain events.
 *
 * @example
 * const onStatusChanged: EventSubscriber = {
 *   eventType: "workItem.status_changed",
 *   name: "NotifyOwner",
 *   handler: async (event) => {
 *     console.log("Moved to", event.payload.to);
 *   },
 * };
 */
export interface EventSubscriber {
  /** The event type to listen for. Supports exact match or wildcard "*" for all events. */
  eventType: string;

  /** Human-readable name for logging and debugging */
  name: string;

  /** The function called when a matching event is emitted */
  handler: (event: DomainEvent) => Promise<void>;
}

/**
 * The context object passed to every action's execute function.
 */
export interface ActionContext {
  /** Who is executing this action */
  caller: Caller;

  /** Resolved for this dispatch only; never reused across operations */
  tenant: TenantContext;

  /** Structured logger */
  logger: Logger;
}
