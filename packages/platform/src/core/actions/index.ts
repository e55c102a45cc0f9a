import type { ActionDefinition } from "@workgate/contracts";
import { reviewActions } from "./reviews.js";
import { workItemActions } from "./work-items.js";
import { workflowActions } from "./workflows.js";

export * from "./reviews.js";
export * from "./work-items.js";
export * from "./workflows.js";

/** Every action the engine exposes, registered at startup. */
export const coreActions: ActionDefinition[] = [
  ...workflowActions,
  ...workItemActions,
  ...reviewActions,
];
