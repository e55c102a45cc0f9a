/**
 * Tenant Context Resolver
 *
 * Turns (principal, requested tenant, required capability) into the
 * TenantContext one operation runs under. Callers re-resolve per operation:
 * memberships can change between requests, so nothing is cached.
 *
 * Resolution:
 *   1. No tenant requested → the principal's default open membership,
 *      else the first open one, else NoTenantSelected
 *   2. Unknown tenant → TenantAccessDenied
 *   3. Inactive or archived tenant → TenantAccessDenied (superusers too)
 *   4. No membership (and not a superuser) → TenantAccessDenied
 *   5. Role lacks the capability → PermissionError
 */

import {
  isTenantOpen,
  type Capability,
  type IdentityProvider,
  type Principal,
  type Tenant,
  type TenantContext,
} from "@workgate/contracts";
import {
  NoTenantSelectedError,
  PermissionError,
  TenantAccessDeniedError,
} from "../errors/index.js";
import { checkCapability } from "./capabilities.js";

export class TenantContextResolver {
  constructor(private readonly identity: IdentityProvider) {}

  async resolve(
    principal: Principal,
    requestedTenantId?: string,
    capability: Capability = "view"
  ): Promise<TenantContext> {
    const tenant = requestedTenantId
      ? await this.requireTenant(requestedTenantId)
      : await this.defaultTenant(principal);

    const decision = await checkCapability(this.identity, principal, tenant, capability);

    if (!decision.role) {
      throw new TenantAccessDeniedError(tenant.id, "not_a_member");
    }
    if (!decision.allowed) {
      throw new PermissionError(principal.userId, capability);
    }

    return {
      tenant,
      principal,
      role: decision.role,
      viaSuperuser: decision.viaSuperuser,
    };
  }

  private async requireTenant(tenantId: string): Promise<Tenant> {
    const tenant = await this.identity.findTenant(tenantId);
    if (!tenant) {
      throw new TenantAccessDeniedError(tenantId, "unknown_tenant");
    }
    if (!isTenantOpen(tenant)) {
      throw new TenantAccessDeniedError(tenantId, "tenant_closed");
    }
    return tenant;
  }

  private async defaultTenant(principal: Principal): Promise<Tenant> {
    const memberships = await this.identity.listMemberships(principal);
    const ordered = [
      ...memberships.filter((m) => m.isDefault),
      ...memberships.filter((m) => !m.isDefault),
    ];

    for (const membership of ordered) {
      const tenant = await this.identity.findTenant(membership.tenantId);
      if (tenant && isTenantOpen(tenant)) {
        return tenant;
      }
    }

    throw new NoTenantSelectedError(principal.userId);
  }
}
