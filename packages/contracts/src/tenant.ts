/**
 * Tenancy
 *
 * A tenant is an isolated organization partition. Every work item,
 * reviewer assignment, workflow and audit entry belongs to exactly one.
 */

import type { CallerType, TenantRole } from "./permission.js";

export interface Tenant {
  id: string;
  slug: string;
  name: string;
  /** Suspended tenants are closed to everyone, superusers included */
  isActive: boolean;
  isArchived: boolean;
}

export interface TenantMembership {
  tenantId: string;
  userId: string;
  role: TenantRole;
  /** The tenant picked when the caller does not name one */
  isDefault: boolean;
}

/** The authenticated identity behind a request. */
export interface Principal {
  userId: string;
  type: CallerType;
}

/**
 * The resolved scope of one operation. Built fresh for every dispatch and
 * passed explicitly into every core operation.
 */
export interface TenantContext {
  tenant: Tenant;
  principal: Principal;
  /** Effective role; superusers always act as admin */
  role: TenantRole;
  viaSuperuser: boolean;
}

/**
 * Supplies principals' memberships and roles. Implemented over the
 * database in production and in memory for tests.
 */
export interface IdentityProvider {
  isSuperuser(principal: Principal): Promise<boolean>;

  /** The principal's role in the tenant, or null without a membership */
  membershipRole(principal: Principal, tenantId: string): Promise<TenantRole | null>;

  listMemberships(principal: Principal): Promise<TenantMembership[]>;

  findTenant(tenantId: string): Promise<Tenant | null>;

  /** Used to resolve team-owned items for "owner" transition rules */
  isTeamMember(principal: Principal, tenantId: string, teamId: string): Promise<boolean>;
}

/** A tenant accepts work only while it is active and not archived. */
export function isTenantOpen(tenant: Tenant): boolean {
  return tenant.isActive && !tenant.isArchived;
}
