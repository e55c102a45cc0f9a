/**
 * Supabase Auth Provider
 *
 * Verifies JWTs issued by Supabase Auth and turns them into a Principal.
 * Tenant membership and roles are NOT read from the token: they live in
 * the engine's identity tables and are resolved per dispatch.
 *
 * Required environment variables:
 *   SUPABASE_URL         — Your Supabase project URL
 *   SUPABASE_SERVICE_KEY — The service role key (server-side only, never expose)
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { AuthProvider, AuthResult } from "@workgate/contracts";

export class SupabaseAuthProvider implements AuthProvider {
  private readonly client: SupabaseClient;
  private readonly projectUrl: string;

  constructor(config: { url: string; serviceKey: string }) {
    this.projectUrl = config.url;
    this.client = createClient(config.url, config.serviceKey, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
    });
  }

  /**
   * @returns the principal if the JWT is valid, null if invalid/expired
   */
  async verifyToken(token: string): Promise<AuthResult> {
    if (!token) return null;

    const { data, error } = await this.client.auth.getUser(token);
    if (error || !data.user) {
      return null;
    }

    return { userId: data.user.id, type: "human" };
  }

  getPublicConfig(): Record<string, string> {
    return {
      provider: "supabase",
      projectUrl: this.projectUrl,
    };
  }
}

/**
 * Creates a SupabaseAuthProvider from environment variables.
 * Throws if required variables are missing.
 */
export function createSupabaseAuthProvider(
  env: NodeJS.ProcessEnv = process.env
): SupabaseAuthProvider {
  const url = env.SUPABASE_URL;
  const serviceKey = env.SUPABASE_SERVICE_KEY;

  if (!url) {
    throw new Error("SUPABASE_URL environment variable is required for Supabase auth.");
  }
  if (!serviceKey) {
    throw new Error("SUPABASE_SERVICE_KEY environment variable is required for Supabase auth.");
  }

  return new SupabaseAuthProvider({ url, serviceKey });
}
