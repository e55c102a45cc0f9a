/**
 * Demo Data
 *
 * Two tenants with a handful of users, so the API is usable right after
 * startup. With the development auth provider, send the user id as the
 * bearer token (e.g. `Authorization: Bearer mia`).
 *
 * The in-memory backend is provisioned on every start; PostgreSQL is
 * provisioned by the seed script.
 */

import {
  dispatch,
  DEV_USER_ID,
  schema,
  type ActionResult,
  type Database,
  type MemoryIdentityProvider,
} from "@workgate/platform";
import { workflowForProject, type WorkflowTemplateId } from "@workgate/domain";
import type { Caller, Tenant, TenantMembership, WorkItem } from "@workgate/contracts";

export const DEMO_TENANTS: Tenant[] = [
  { id: "acme", slug: "acme", name: "Acme Corp", isActive: true, isArchived: false },
  { id: "globex", slug: "globex", name: "Globex", isActive: true, isArchived: false },
];

export const DEMO_MEMBERSHIPS: TenantMembership[] = [
  { tenantId: "acme", userId: DEV_USER_ID, role: "admin", isDefault: true },
  { tenantId: "acme", userId: "ada", role: "admin", isDefault: true },
  { tenantId: "acme", userId: "mia", role: "manager", isDefault: true },
  { tenantId: "acme", userId: "alice", role: "member", isDefault: true },
  { tenantId: "acme", userId: "bob", role: "member", isDefault: true },
  { tenantId: "acme", userId: "carol", role: "member", isDefault: true },
  { tenantId: "acme", userId: "vic", role: "viewer", isDefault: true },
  { tenantId: "globex", userId: "tom", role: "admin", isDefault: true },
  { tenantId: "globex", userId: "alice", role: "member", isDefault: false },
];

export const DEMO_SUPERUSERS = ["root"];

/** Project → template, per tenant */
const DEMO_PROJECTS: { tenantId: string; projectId: string; template: WorkflowTemplateId }[] = [
  { tenantId: "acme", projectId: "expenses", template: "task-approval" },
  { tenantId: "acme", projectId: "web", template: "scrum" },
  { tenantId: "globex", projectId: "ops", template: "kanban" },
];

const DEMO_ITEMS: { tenantId: string; projectId: string; title: string; ownerId: string }[] = [
  { tenantId: "acme", projectId: "expenses", title: "Conference travel", ownerId: "alice" },
  { tenantId: "acme", projectId: "expenses", title: "New laptop", ownerId: "bob" },
  { tenantId: "acme", projectId: "web", title: "Landing page copy", ownerId: "carol" },
  { tenantId: "globex", projectId: "ops", title: "Rotate TLS certificates", ownerId: "alice" },
];

function allUserIds(): string[] {
  return [...new Set([...DEMO_MEMBERSHIPS.map((m) => m.userId), ...DEMO_SUPERUSERS])];
}

export function provisionMemoryIdentity(identity: MemoryIdentityProvider): void {
  for (const tenant of DEMO_TENANTS) identity.addTenant(tenant);
  for (const m of DEMO_MEMBERSHIPS) identity.addMembership(m.userId, m.tenantId, m.role, m.isDefault);
  for (const userId of DEMO_SUPERUSERS) identity.addSuperuser(userId);
}

/** Inserts the demo identities; rows that already exist are kept. */
export async function provisionPostgresIdentity(db: Database): Promise<void> {
  await db.insert(schema.tenants).values(DEMO_TENANTS).onConflictDoNothing();
  await db
    .insert(schema.users)
    .values(
      allUserIds().map((id) => ({ id, displayName: id, isSuperuser: DEMO_SUPERUSERS.includes(id) }))
    )
    .onConflictDoNothing();
  await db.insert(schema.tenantMemberships).values(DEMO_MEMBERSHIPS).onConflictDoNothing();
}

function unwrap<T>(result: ActionResult<T>, what: string): T {
  if (!result.success) {
    throw new Error(`Demo seed failed to ${what}: ${result.error}`);
  }
  return result.data;
}

/**
 * Configures the demo workflows and, for projects without items yet,
 * creates a few. Runs through the Action Bus like any client would.
 *
 * @returns the number of items created
 */
export async function seedDemoWorkflows(): Promise<number> {
  const system = (tenantId: string): Caller => ({ userId: "root", type: "system", tenantId });
  let created = 0;

  for (const project of DEMO_PROJECTS) {
    unwrap(
      await dispatch(
        "workflow.configure",
        workflowForProject(project.template, project.projectId),
        system(project.tenantId)
      ),
      `configure ${project.projectId}`
    );
  }

  for (const item of DEMO_ITEMS) {
    const existing = unwrap(
      await dispatch<WorkItem[]>(
        "workItem.list",
        { projectId: item.projectId, includeArchived: true },
        system(item.tenantId)
      ),
      `list ${item.projectId}`
    );
    if (existing.some((w) => w.title === item.title)) continue;

    unwrap(
      await dispatch(
        "workItem.create",
        { projectId: item.projectId, title: item.title, ownerId: item.ownerId },
        system(item.tenantId)
      ),
      `create "${item.title}"`
    );
    created += 1;
  }

  return created;
}
