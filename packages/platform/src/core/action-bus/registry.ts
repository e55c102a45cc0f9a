/**
 * Action Registry
 *
 * Central registry of all actions in the system. The REST adapter and the
 * /api/meta/actions listing read it.
 */

import type { ActionDefinition } from "@workgate/contracts";

/** All registered actions, keyed by action ID */
const actions = new Map<string, ActionDefinition>();

/**
 * Registers an action. Throws if an action with the same ID already exists.
 */
export function registerAction(action: ActionDefinition): void {
  if (actions.has(action.id)) {
    throw new Error(
      `Action "${action.id}" is already registered. Action IDs must be unique.`
    );
  }
  actions.set(action.id, action);
}

export function registerActions(actionList: readonly ActionDefinition[]): void {
  for (const action of actionList) {
    registerAction(action);
  }
}

export function getAction(id: string): ActionDefinition | undefined {
  return actions.get(id);
}

export function getAllActions(): ActionDefinition[] {
  return Array.from(actions.values());
}

/**
 * Actions whose ID starts with "<namespace>." (e.g., "review").
 */
export function getActionsInNamespace(namespace: string): ActionDefinition[] {
  const prefix = namespace + ".";
  return Array.from(actions.values()).filter((a) => a.id.startsWith(prefix));
}

/**
 * Clears all registered actions. Used for testing.
 */
export function clearActionRegistry(): void {
  actions.clear();
}
