/**
 * REST Adapter
 *
 * Maps the Action Bus to HTTP endpoints on a Fastify instance:
 *
 *   1. Generic action endpoint: POST /api/actions/:actionId
 *      — Any action can be dispatched by ID with a JSON body
 *
 *   2. Resource routes under /api/work-items, /api/projects/:projectId,
 *      /api/tenant and /api/audit — each one dispatches a single action
 *
 *   3. Metadata endpoint: GET /api/meta/actions[?namespace=review]
 *      — The action catalogue with capabilities and examples
 *
 * Routes never call services directly, so tenant resolution, validation
 * and logging happen exactly once per request, in dispatch().
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { dispatch, type ActionErrorType, type ActionResult } from "../../core/action-bus/bus.js";
import { getActionsInNamespace, getAllActions } from "../../core/action-bus/registry.js";
import { getAuthProvider } from "../../auth/index.js";
import { authMiddleware } from "./auth-middleware.js";

/**
 * HTTP status for each failure kind. Conflicts with the item's current
 * state are 409; rule violations the caller could fix by asking for a
 * different target are 422.
 */
export const ERROR_TYPE_TO_STATUS: Record<ActionErrorType, number> = {
  validation: 400,
  permission: 403,
  tenant_access_denied: 403,
  unknown_reviewer: 403,
  not_found: 404,
  no_tenant_selected: 409,
  not_in_reviewable_state: 409,
  already_decided: 409,
  item_archived: 409,
  invalid_transition: 422,
  workflow_config: 422,
  persistence: 503,
  unknown: 500,
};

const ACTION_ID_PATTERN = /^[a-z][a-zA-Z0-9]*(\.[a-z][a-zA-Z0-9]*)*$/;

const jsonObject = z.record(z.string(), z.unknown());

/** The request body as an object; anything else counts as empty. */
function bodyOf(request: FastifyRequest): Record<string, unknown> {
  const parsed = jsonObject.safeParse(request.body);
  return parsed.success ? parsed.data : {};
}

/**
 * Query strings carry only text. Numeric and boolean filters are
 * converted here; values that do not convert are passed on unchanged so
 * the action's schema reports them.
 */
function queryNumber(value: string | undefined): number | string | undefined {
  if (value === undefined || value === "") return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : value;
}

function queryBoolean(value: string | undefined): boolean | string | undefined {
  if (value === undefined || value === "") return undefined;
  if (value === "true") return true;
  if (value === "false") return false;
  return value;
}

/** Drops undefined values so schema defaults apply. */
function compact(input: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}

/**
 * Dispatches one action for the request and sets the status from the
 * result.
 */
async function run(
  request: FastifyRequest,
  reply: FastifyReply,
  actionId: string,
  input: unknown,
  successStatus = 200
): Promise<ActionResult> {
  const caller = request.caller;
  if (!caller) {
    reply.status(401);
    return {
      success: false,
      error: "Authentication required.",
      errorType: "permission",
      retryable: false,
    };
  }

  const result = await dispatch(actionId, input, caller);
  reply.status(result.success ? successStatus : ERROR_TYPE_TO_STATUS[result.errorType]);
  return result;
}

type ItemParams = { Params: { itemId: string } };
type ProjectParams = { Params: { projectId: string } };

/**
 * Registers all REST routes on the Fastify instance.
 */
export async function registerRESTRoutes(app: FastifyInstance): Promise<void> {
  app.addHook("preHandler", authMiddleware);

  // ---------------------------------------------------------------
  // Public endpoints (no auth required)
  // ---------------------------------------------------------------

  /** Auth configuration — tells clients how to authenticate */
  app.get("/api/auth/config", async () => {
    return getAuthProvider().getPublicConfig();
  });

  /** Returns the registered actions, optionally one namespace's */
  app.get<{ Querystring: { namespace?: string } }>("/api/meta/actions", async (request) => {
    const { namespace } = request.query;
    const listed = namespace ? getActionsInNamespace(namespace) : getAllActions();
    return listed.map((a) => ({
      id: a.id,
      name: a.name,
      description: a.description,
      capability: a.capability,
      idempotent: a.idempotent,
      examples: a.examples ?? [],
    }));
  });

  // ---------------------------------------------------------------
  // Generic action dispatch
  // ---------------------------------------------------------------

  app.post<{ Params: { actionId: string } }>("/api/actions/:actionId", async (request, reply) => {
    if (!ACTION_ID_PATTERN.test(request.params.actionId)) {
      return reply.status(400).send({
        success: false,
        error: "Invalid action ID format",
        errorType: "validation",
        retryable: false,
      });
    }

    return run(request, reply, request.params.actionId, request.body ?? {});
  });

  // ---------------------------------------------------------------
  // Tenant
  // ---------------------------------------------------------------

  app.get("/api/tenant", async (request, reply) => run(request, reply, "tenant.current", {}));

  // ---------------------------------------------------------------
  // Workflows
  // ---------------------------------------------------------------

  app.get<ProjectParams>("/api/projects/:projectId/workflow", async (request, reply) =>
    run(request, reply, "workflow.get", { projectId: request.params.projectId })
  );

  app.put<ProjectParams>("/api/projects/:projectId/workflow", async (request, reply) =>
    run(request, reply, "workflow.configure", {
      ...bodyOf(request),
      projectId: request.params.projectId,
    })
  );

  // ---------------------------------------------------------------
  // Work items
  // ---------------------------------------------------------------

  app.get<{
    Querystring: {
      projectId?: string;
      status?: string;
      includeArchived?: string;
      limit?: string;
      offset?: string;
    };
  }>("/api/work-items", async (request, reply) => {
    const { projectId, status, includeArchived, limit, offset } = request.query;
    return run(
      request,
      reply,
      "workItem.list",
      compact({
        projectId,
        status,
        includeArchived: queryBoolean(includeArchived),
        limit: queryNumber(limit),
        offset: queryNumber(offset),
      })
    );
  });

  app.post("/api/work-items", async (request, reply) =>
    run(request, reply, "workItem.create", bodyOf(request), 201)
  );

  app.get<ItemParams>("/api/work-items/:itemId", async (request, reply) =>
    run(request, reply, "workItem.get", { itemId: request.params.itemId })
  );

  app.post<ItemParams>("/api/work-items/:itemId/transition", async (request, reply) =>
    run(request, reply, "workItem.transition", {
      ...bodyOf(request),
      itemId: request.params.itemId,
    })
  );

  app.get<ItemParams>("/api/work-items/:itemId/transitions", async (request, reply) =>
    run(request, reply, "workItem.allowedTransitions", { itemId: request.params.itemId })
  );

  app.post<ItemParams>("/api/work-items/:itemId/archive", async (request, reply) =>
    run(request, reply, "workItem.archive", { itemId: request.params.itemId })
  );

  app.get<ItemParams>("/api/work-items/:itemId/history", async (request, reply) =>
    run(request, reply, "workItem.history", { itemId: request.params.itemId })
  );

  app.get<ItemParams>("/api/work-items/:itemId/comments", async (request, reply) =>
    run(request, reply, "workItem.comments", { itemId: request.params.itemId })
  );

  app.post<ItemParams>("/api/work-items/:itemId/comments", async (request, reply) =>
    run(
      request,
      reply,
      "workItem.comment",
      { ...bodyOf(request), itemId: request.params.itemId },
      201
    )
  );

  // ---------------------------------------------------------------
  // Reviews
  // ---------------------------------------------------------------

  app.get<ItemParams>("/api/work-items/:itemId/reviews", async (request, reply) =>
    run(request, reply, "review.status", { itemId: request.params.itemId })
  );

  app.post<ItemParams>("/api/work-items/:itemId/reviewers", async (request, reply) =>
    run(request, reply, "review.assign", {
      ...bodyOf(request),
      itemId: request.params.itemId,
    })
  );

  app.delete<{ Params: { itemId: string; reviewerId: string } }>(
    "/api/work-items/:itemId/reviewers/:reviewerId",
    async (request, reply) =>
      run(request, reply, "review.unassign", {
        itemId: request.params.itemId,
        reviewerId: request.params.reviewerId,
      })
  );

  app.post<ItemParams>("/api/work-items/:itemId/decision", async (request, reply) =>
    run(request, reply, "review.decide", {
      ...bodyOf(request),
      itemId: request.params.itemId,
    })
  );

  app.post<ItemParams>("/api/work-items/:itemId/reviews/reset", async (request, reply) =>
    run(request, reply, "review.reset", { itemId: request.params.itemId })
  );

  // ---------------------------------------------------------------
  // Audit
  // ---------------------------------------------------------------

  app.get<{
    Querystring: {
      actorId?: string;
      action?: string;
      entityType?: string;
      workItemId?: string;
      dateFrom?: string;
      dateTo?: string;
      limit?: string;
      offset?: string;
    };
  }>("/api/audit", async (request, reply) => {
    const { limit, offset, ...filters } = request.query;
    return run(
      request,
      reply,
      "audit.list",
      compact({ ...filters, limit: queryNumber(limit), offset: queryNumber(offset) })
    );
  });
}
