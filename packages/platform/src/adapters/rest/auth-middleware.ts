/**
 * Fastify Authentication Middleware
 *
 * Verifies the Bearer token through the configured AuthProvider and
 * attaches the Caller to the request. The optional X-Tenant-Id header
 * becomes the caller's requested tenant; whether the caller may act there
 * is decided later, by the tenant context resolver, on every dispatch.
 *
 * Public routes (health check, action catalogue, auth config) are exempt.
 */

import type { FastifyRequest, FastifyReply } from "fastify";
import type { Caller } from "@workgate/contracts";
import { getAuthProvider } from "../../auth/index.js";

const PUBLIC_ROUTES = new Set([
  "/health",
  "/api/health",
  "/api/meta/actions",
  "/api/auth/config",
]);

export const TENANT_HEADER = "x-tenant-id";

declare module "fastify" {
  interface FastifyRequest {
    caller?: Caller;
  }
}

/**
 * Extracts the Bearer token from the Authorization header.
 * Returns null if the header is missing or malformed.
 */
function extractBearerToken(request: FastifyRequest): string | null {
  const header = request.headers.authorization;
  if (!header) return null;

  const [scheme, token, ...rest] = header.split(" ");
  if (rest.length > 0 || !token || scheme?.toLowerCase() !== "bearer") return null;

  return token;
}

function requestedTenant(request: FastifyRequest): string | undefined {
  const value = request.headers[TENANT_HEADER];
  const tenantId = Array.isArray(value) ? value[0] : value;
  return tenantId?.trim() || undefined;
}

/**
 * Fastify preHandler hook that enforces authentication.
 * Returns 401 when the provider rejects the token.
 */
export async function authMiddleware(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  // CORS preflight never carries credentials
  if (request.method === "OPTIONS") {
    return;
  }

  const path = request.url.split("?")[0] ?? request.url;
  if (PUBLIC_ROUTES.has(path)) {
    return;
  }

  const token = extractBearerToken(request);

  // Without a token the dev provider still yields its default user;
  // real providers return null.
  const principal = await getAuthProvider().verifyToken(token ?? "");

  if (!principal) {
    await reply.status(401).send({
      success: false,
      error: token
        ? "Invalid or expired authentication token."
        : "Authentication required. Provide a Bearer token in the Authorization header.",
    });
    return;
  }

  const tenantId = requestedTenant(request);
  request.caller = tenantId ? { ...principal, tenantId } : { ...principal };
}
