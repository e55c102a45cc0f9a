/**
 * Auth Module
 *
 * Manages the active AuthProvider instance. The provider is set at
 * startup (in bootstrap) and used by the auth middleware to verify
 * every incoming request.
 *
 * Provider selection:
 *   - If SUPABASE_URL and SUPABASE_SERVICE_KEY are set → SupabaseAuthProvider
 *   - Otherwise in non-production → DevAuthProvider
 *   - In production without config → throws (fail fast)
 */

import type { AuthProvider } from "@workgate/contracts";
import { createLogger } from "../core/action-bus/middleware/logging.js";
import { createSupabaseAuthProvider } from "./supabase-provider.js";
import { DevAuthProvider } from "./dev-provider.js";

const logger = createLogger("auth");

let authProvider: AuthProvider | null = null;

/**
 * Initialize the auth provider based on environment configuration.
 * Call this once at startup (in bootstrap).
 */
export function initAuthProvider(env: NodeJS.ProcessEnv = process.env): AuthProvider {
  if (env.SUPABASE_URL && env.SUPABASE_SERVICE_KEY) {
    authProvider = createSupabaseAuthProvider(env);
    logger.info("Using Supabase auth provider");
  } else if (env.NODE_ENV === "production") {
    throw new Error(
      "Authentication must be configured in production. " +
        "Set SUPABASE_URL and SUPABASE_SERVICE_KEY environment variables."
    );
  } else {
    authProvider = new DevAuthProvider();
    logger.info("Using development auth provider (bearer token is the user id)");
  }

  return authProvider;
}

/**
 * Get the active auth provider.
 * Throws if initAuthProvider() hasn't been called.
 */
export function getAuthProvider(): AuthProvider {
  if (!authProvider) {
    throw new Error("Auth provider not initialized. Call initAuthProvider() in bootstrap.");
  }
  return authProvider;
}

/**
 * Set a custom auth provider (for testing or custom implementations).
 */
export function setAuthProvider(provider: AuthProvider): void {
  authProvider = provider;
}

export function resetAuthProvider(): void {
  authProvider = null;
}

export { SupabaseAuthProvider, createSupabaseAuthProvider } from "./supabase-provider.js";
export { DevAuthProvider, DEV_USER_ID } from "./dev-provider.js";
