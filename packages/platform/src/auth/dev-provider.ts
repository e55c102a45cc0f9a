/**
 * Development Auth Provider
 *
 * Auth provider for local development when no external auth service is
 * configured. The bearer token IS the user id, so a developer can act as
 * any seeded user by sending `Authorization: Bearer <userId>`. Without a
 * token the caller is "dev-user".
 *
 * The principal still goes through tenant resolution like any other: the
 * token only names the user, never grants tenant access.
 *
 * NEVER use this in production — anyone can claim any identity.
 */

import type { AuthProvider, AuthResult } from "@workgate/contracts";

export const DEV_USER_ID = "dev-user";

/** User ids the seed script creates; anything else is refused */
const USER_ID_PATTERN = /^[A-Za-z0-9_.@-]{1,128}$/;

export class DevAuthProvider implements AuthProvider {
  async verifyToken(token: string): Promise<AuthResult> {
    const userId = token.trim();
    if (userId === "") {
      return { userId: DEV_USER_ID, type: "human" };
    }
    if (!USER_ID_PATTERN.test(userId)) {
      return null;
    }
    return { userId, type: "human" };
  }

  getPublicConfig(): Record<string, string> {
    return {
      provider: "dev",
      message: "Development mode — send the user id as the bearer token",
    };
  }
}
