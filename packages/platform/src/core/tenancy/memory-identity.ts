/**
 * In-Memory Identity Provider
 *
 * Holds tenants, memberships, superusers and team rosters in maps.
 * Used by tests and by the API when no database is configured.
 */

import type {
  IdentityProvider,
  Principal,
  Tenant,
  TenantMembership,
  TenantRole,
} from "@workgate/contracts";

export class MemoryIdentityProvider implements IdentityProvider {
  private readonly tenants = new Map<string, Tenant>();
  private readonly memberships: TenantMembership[] = [];
  private readonly superusers = new Set<string>();
  private readonly teams = new Map<string, Set<string>>();

  addTenant(tenant: Omit<Tenant, "isActive" | "isArchived"> & Partial<Tenant>): Tenant {
    const stored: Tenant = { isActive: true, isArchived: false, ...tenant };
    this.tenants.set(stored.id, stored);
    return stored;
  }

  /** Replaces the user's role if a membership already exists. */
  addMembership(
    userId: string,
    tenantId: string,
    role: TenantRole,
    isDefault = false
  ): void {
    const existing = this.memberships.find(
      (m) => m.userId === userId && m.tenantId === tenantId
    );
    if (existing) {
      existing.role = role;
      existing.isDefault = isDefault;
      return;
    }
    this.memberships.push({ userId, tenantId, role, isDefault });
  }

  removeMembership(userId: string, tenantId: string): void {
    const index = this.memberships.findIndex(
      (m) => m.userId === userId && m.tenantId === tenantId
    );
    if (index >= 0) this.memberships.splice(index, 1);
  }

  addSuperuser(userId: string): void {
    this.superusers.add(userId);
  }

  addTeamMember(tenantId: string, teamId: string, userId: string): void {
    const key = `${tenantId}:${teamId}`;
    const roster = this.teams.get(key) ?? new Set<string>();
    roster.add(userId);
    this.teams.set(key, roster);
  }

  async isSuperuser(principal: Principal): Promise<boolean> {
    return this.superusers.has(principal.userId);
  }

  async membershipRole(principal: Principal, tenantId: string): Promise<TenantRole | null> {
    const membership = this.memberships.find(
      (m) => m.userId === principal.userId && m.tenantId === tenantId
    );
    return membership?.role ?? null;
  }

  async listMemberships(principal: Principal): Promise<TenantMembership[]> {
    return this.memberships
      .filter((m) => m.userId === principal.userId)
      .map((m) => ({ ...m }));
  }

  async findTenant(tenantId: string): Promise<Tenant | null> {
    const tenant = this.tenants.get(tenantId);
    return tenant ? { ...tenant } : null;
  }

  async isTeamMember(principal: Principal, tenantId: string, teamId: string): Promise<boolean> {
    return this.teams.get(`${tenantId}:${teamId}`)?.has(principal.userId) ?? false;
  }
}
