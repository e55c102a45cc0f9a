/**
 * Capability Check
 *
 * The one place that decides whether a principal may do something inside a
 * tenant. The tenant context resolver calls it for every dispatch; nothing
 * else re-implements role checks.
 */

import {
  roleGrants,
  type Capability,
  type IdentityProvider,
  type Principal,
  type Tenant,
  type TenantRole,
} from "@workgate/contracts";

export interface CapabilityDecision {
  allowed: boolean;

  /** Effective role, null without a membership */
  role: TenantRole | null;

  viaSuperuser: boolean;
}

/**
 * Superusers act as admin in every tenant. Everyone else needs a
 * membership whose role grants the capability.
 */
export async function checkCapability(
  identity: IdentityProvider,
  principal: Principal,
  tenant: Tenant,
  capability: Capability
): Promise<CapabilityDecision> {
  if (await identity.isSuperuser(principal)) {
    return { allowed: true, role: "admin", viaSuperuser: true };
  }

  const role = await identity.membershipRole(principal, tenant.id);
  if (!role) {
    return { allowed: false, role: null, viaSuperuser: false };
  }

  return { allowed: roleGrants(role, capability), role, viaSuperuser: false };
}
