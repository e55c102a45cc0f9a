/**
 * Permission Definitions
 *
 * Roles are held per tenant membership. Every action declares the one
 * capability it needs; the tenant context resolver checks that capability
 * against the caller's role before the action runs.
 */

/** The type of caller invoking an action */
export type CallerType = "human" | "ai-agent" | "system" | "webhook";

export const TENANT_ROLES = ["admin", "manager", "member", "viewer"] as const;

/** Role a principal holds inside one tenant */
export type TenantRole = (typeof TENANT_ROLES)[number];

/**
 * What an operation requires of the caller.
 *
 *   view       — read items, workflows, approval state
 *   edit       — create items, move statuses, manage reviewers
 *   manage     — archive items, read the audit trail
 *   administer — change the tenant's workflow configuration
 */
export type Capability = "view" | "edit" | "manage" | "administer";

/** Capabilities granted by each tenant role. */
export const ROLE_CAPABILITIES: Readonly<Record<TenantRole, readonly Capability[]>> = {
  admin: ["view", "edit", "manage", "administer"],
  manager: ["view", "edit", "manage"],
  member: ["view", "edit"],
  viewer: ["view"],
};

/**
 * Returns true when the role grants the capability.
 */
export function roleGrants(role: TenantRole, capability: Capability): boolean {
  return ROLE_CAPABILITIES[role].includes(capability);
}

/**
 * Relationship-based roles a transition rule may name in addition to
 * tenant roles. "owner" is the item's owner (or a member of the owning
 * team); "reviewer" is anyone assigned to review the item.
 */
export type ItemRelation = "owner" | "reviewer";

/** Who may perform a manual transition along one rule. */
export type TransitionActor = TenantRole | ItemRelation;
