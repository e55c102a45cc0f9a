/**
 * PostgreSQL Identity Provider
 *
 * Reads tenants, memberships, superusers and team rosters from the
 * identity tables in schema.ts. Read-only: provisioning happens through
 * the seed script or an external admin tool.
 */

import { and, asc, eq } from "drizzle-orm";
import type {
  IdentityProvider,
  Principal,
  Tenant,
  TenantMembership,
  TenantRole,
} from "@workgate/contracts";
import type { Database } from "./connection.js";
import { teamMembers, tenantMemberships, tenants, users } from "./schema.js";

export class PostgresIdentityProvider implements IdentityProvider {
  constructor(private readonly db: Database) {}

  async isSuperuser(principal: Principal): Promise<boolean> {
    const rows = await this.db
      .select({ isSuperuser: users.isSuperuser })
      .from(users)
      .where(eq(users.id, principal.userId))
      .limit(1);
    return rows[0]?.isSuperuser ?? false;
  }

  async membershipRole(principal: Principal, tenantId: string): Promise<TenantRole | null> {
    const rows = await this.db
      .select({ role: tenantMemberships.role })
      .from(tenantMemberships)
      .where(
        and(
          eq(tenantMemberships.tenantId, tenantId),
          eq(tenantMemberships.userId, principal.userId)
        )
      )
      .limit(1);
    return rows[0]?.role ?? null;
  }

  async listMemberships(principal: Principal): Promise<TenantMembership[]> {
    return this.db
      .select({
        tenantId: tenantMemberships.tenantId,
        userId: tenantMemberships.userId,
        role: tenantMemberships.role,
        isDefault: tenantMemberships.isDefault,
      })
      .from(tenantMemberships)
      .where(eq(tenantMemberships.userId, principal.userId))
      .orderBy(asc(tenantMemberships.createdAt));
  }

  async findTenant(tenantId: string): Promise<Tenant | null> {
    const rows = await this.db
      .select({
        id: tenants.id,
        slug: tenants.slug,
        name: tenants.name,
        isActive: tenants.isActive,
        isArchived: tenants.isArchived,
      })
      .from(tenants)
      .where(eq(tenants.id, tenantId))
      .limit(1);
    return rows[0] ?? null;
  }

  async isTeamMember(principal: Principal, tenantId: string, teamId: string): Promise<boolean> {
    const rows = await this.db
      .select({ id: teamMembers.id })
      .from(teamMembers)
      .where(
        and(
          eq(teamMembers.tenantId, tenantId),
          eq(teamMembers.teamId, teamId),
          eq(teamMembers.userId, principal.userId)
        )
      )
      .limit(1);
    return rows.length > 0;
  }
}
