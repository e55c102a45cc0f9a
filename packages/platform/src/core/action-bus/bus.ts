/**
 * Action Bus
 *
 * The central dispatch for all operations. Every action goes through this
 * pipeline:
 *
 *   1. Lookup action by ID
 *   2. Validate input against the action's Zod schema
 *   3. Resolve the tenant context and check the action's capability
 *   4. Execute the action's business logic
 *   5. Log the result
 *
 * The Bus is the SINGLE entry point for all operations, whether triggered
 * by an HTTP request, a script, or a background job. The tenant context is
 * resolved afresh on every dispatch.
 */

import type { ActionContext, Caller, TenantContext } from "@workgate/contracts";
import { getAction } from "./registry.js";
import { validateInput } from "./middleware/validation.js";
import { createLogger, logActionExecution } from "./middleware/logging.js";
import { PlatformError, type ErrorKind } from "../errors/index.js";
import { captureException, subjectTags } from "../observability/index.js";
import { getWorkflowCore } from "../services/index.js";

/**
 * Error categories for structured error handling. One per PlatformError
 * kind; the REST adapter maps each to an HTTP status.
 */
export type ActionErrorType = ErrorKind;

/**
 * The result of dispatching an action.
 * Always includes success status — callers should check this.
 * On failure, errorType identifies the category for HTTP mapping.
 */
export type ActionResult<T = unknown> =
  | { success: true; data: T }
  | {
      success: false;
      error: string;
      errorType: ActionErrorType;
      /** Only persistence failures may be retried unchanged */
      retryable: boolean;
      details?: Record<string, unknown>;
    };

/**
 * Dispatches an action through the Action Bus pipeline.
 *
 * @param actionId - The action's unique ID (e.g., "review.decide")
 * @param input - The raw input data (will be validated)
 * @param caller - Who is executing this action, and the tenant they asked for
 */
export async function dispatch<T = unknown>(
  actionId: string,
  input: unknown,
  caller: Caller
): Promise<ActionResult<T>> {
  const startTime = performance.now();
  const logger = createLogger(`action:${actionId}`);
  let tenant: TenantContext | undefined;

  try {
    // 1. Lookup
    const action = getAction(actionId);
    if (!action) {
      return {
        success: false,
        error: `Action "${actionId}" not found`,
        errorType: "not_found",
        retryable: false,
      };
    }

    // 2. Validate
    const validatedInput = validateInput(action, input);

    // 3. Resolve tenant + capability
    tenant = await getWorkflowCore().resolver.resolve(
      { userId: caller.userId, type: caller.type },
      caller.tenantId,
      action.capability
    );

    // 4. Execute
    const context: ActionContext = { caller, tenant, logger };
    const result = await action.execute(validatedInput, context);

    // 5. Log success
    logActionExecution({
      actionId,
      userId: caller.userId,
      tenantId: tenant.tenant.id,
      durationMs: Math.round(performance.now() - startTime),
      success: true,
    });

    return { success: true, data: result as T };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : "Unknown error";
    const tenantId = tenant?.tenant.id ?? caller.tenantId;

    if (error instanceof PlatformError) {
      logActionExecution({
        actionId,
        userId: caller.userId,
        tenantId,
        durationMs: Math.round(performance.now() - startTime),
        success: false,
        errorType: error.kind,
        error: errorMessage,
      });

      return {
        success: false,
        error: errorMessage,
        errorType: error.kind,
        retryable: error.retryable,
        details: error.details(),
      };
    }

    logActionExecution({
      actionId,
      userId: caller.userId,
      tenantId,
      durationMs: Math.round(performance.now() - startTime),
      success: false,
      errorType: "unknown",
      error: errorMessage,
    });

    // Unknown error — log full details server-side, return generic message
    logger.error("Action execution failed", {
      error: errorMessage,
      stack: error instanceof Error ? error.stack : undefined,
    });

    if (error instanceof Error) {
      captureException(error, {
        actionId,
        userId: caller.userId,
        tenantId,
        workItemId: subjectTags(input).workItemId,
      });
    }

    return {
      success: false,
      error: "An unexpected error occurred",
      errorType: "unknown",
      retryable: false,
    };
  }
}
