/**
 * Action Definition
 *
 * An Action is a single, well-defined operation the engine exposes.
 * Route handlers, scripts and background jobs all reach the engine through
 * actions dispatched on the Action Bus.
 *
 * Every Action is:
 *   - Typed (input is validated with Zod before execute runs)
 *   - Tenant-scoped (the bus resolves the tenant context first)
 *   - Capability-checked (one declared capability per action)
 */

import type { z } from "zod";
import type { ActionContext } from "./context.js";
import type { Capability } from "./permission.js";

/**
 * Example of how an action is used.
 * Served by the actions metadata endpoint as living documentation.
 */
export interface ActionExample {
  /** What this example demonstrates (e.g., "Approve as the second reviewer") */
  description: string;

  /** Example input data */
  input: Record<string, unknown>;
}

/**
 * The complete definition of an action.
 */
export interface ActionDefinition<TInput = unknown, TOutput = unknown> {
  /**
   * Unique identifier.
   * Convention: "entity.verb" (e.g., "workItem.transition", "review.decide")
   */
  id: string;

  /** Human-readable name (e.g., "Transition Work Item") */
  name: string;

  /** Plain English description of what this action does. */
  description: string;

  /** Zod schema for input validation. */
  inputSchema: z.ZodType<TInput, z.ZodTypeDef, unknown>;

  /** Required of the caller in the resolved tenant */
  capability: Capability;

  /**
   * Is this action safe to retry?
   * true = calling it twice with same input produces the same result.
   */
  idempotent: boolean;

  examples?: ActionExample[];

  /**
   * The business logic. No HTTP, no framework.
   * Declared as a method so typed actions fit the untyped registry.
   */
  execute(input: TInput, context: ActionContext): Promise<TOutput>;
}

/**
 * Helper function to define an action with type checking.
 */
export function defineAction<TInput, TOutput>(
  definition: ActionDefinition<TInput, TOutput>
): ActionDefinition<TInput, TOutput> {
  return definition;
}
