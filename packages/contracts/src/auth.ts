/**
 * Authentication Contract
 *
 * Defines the AuthProvider interface — the abstraction that decouples the
 * HTTP edge from any specific authentication implementation. Token issuance
 * and password handling live with the provider, never in the engine.
 *
 * Swapping auth providers requires:
 *   1. Implementing a new class that satisfies AuthProvider
 *   2. Changing the bootstrap code to inject the new provider
 */

import type { Principal } from "./tenant.js";

/**
 * The result of verifying an authentication token.
 * Either a valid Principal (authenticated) or null (invalid/expired token).
 */
export type AuthResult = Principal | null;

export interface AuthProvider {
  /**
   * Verify an authentication token and extract the principal.
   *
   * @param token - The raw token (typically a JWT from the Authorization header)
   */
  verifyToken(token: string): Promise<AuthResult>;

  /**
   * Public configuration a client needs to authenticate.
   * Served by a public endpoint — never include secrets.
   */
  getPublicConfig(): Record<string, string>;
}
