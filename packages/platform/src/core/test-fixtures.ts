/**
 * Shared fixtures for the core test suites: a two-tenant identity setup,
 * a review workflow, and a core wired over the in-memory store with a
 * stepping clock and captured events.
 */

import type {
  DomainEvent,
  ReviewerAssignment,
  TenantContext,
  WorkflowDefinition,
  WorkItem,
} from "@workgate/contracts";
import { createWorkflowCore, type WorkflowCore } from "./services/index.js";
import { MemoryWorkflowStore } from "./store/memory-store.js";
import { MemoryIdentityProvider } from "./tenancy/memory-identity.js";

export const TENANT_A = "tenant-a";
export const TENANT_B = "tenant-b";
export const PROJECT = "expenses";

/** 2026-03-02T08:00:00Z; each clock read advances one second */
const CLOCK_START = Date.UTC(2026, 2, 2, 8, 0, 0);

/**
 * draft → submitted → in_review → approved | rejected → draft,
 * plus a withdraw edge in_review → draft for the owner or a manager.
 */
export function reviewWorkflow(projectId = PROJECT): WorkflowDefinition {
  return {
    projectId,
    name: "Expense approval",
    statuses: [
      { key: "draft", label: "Draft", category: "todo", initial: true },
      { key: "submitted", label: "Submitted", category: "in_progress", milestone: "submitted" },
      {
        key: "in_review",
        label: "In review",
        category: "in_progress",
        reviewable: true,
        milestone: "reviewStarted",
      },
      { key: "approved", label: "Approved", category: "done", terminal: true, milestone: "approved" },
      { key: "rejected", label: "Rejected", category: "in_progress", milestone: "rejected" },
    ],
    rules: [
      { from: "draft", to: "submitted", enabled: true },
      { from: "submitted", to: "in_review", enabled: true },
      { from: "in_review", to: "approved", enabled: true },
      { from: "in_review", to: "rejected", enabled: true },
      { from: "rejected", to: "draft", enabled: true },
      { from: "in_review", to: "draft", enabled: true, allowedRoles: ["owner", "manager"] },
    ],
    approval: { approvedStatus: "approved", rejectedStatus: "rejected" },
  };
}

export interface Harness {
  store: MemoryWorkflowStore;
  identity: MemoryIdentityProvider;
  core: WorkflowCore;
  events: DomainEvent[];

  /** Resolved context for `userId`, in tenant A unless given */
  as(userId: string, tenantId?: string): Promise<TenantContext>;

  /** Inserts an item directly, bypassing the services */
  seedItem(overrides?: Partial<WorkItem>): Promise<WorkItem>;

  /** Inserts pending assignments directly, in the given order */
  seedReviewers(itemId: string, reviewerIds: string[]): Promise<ReviewerAssignment[]>;

  /** Current committed state of an item in tenant A */
  item(itemId: string): Promise<WorkItem | null>;
}

/**
 * Tenant A members: alice (member, owns items), bob, carol, dave (members,
 * reviewers), mia (manager), ada (admin), vic (viewer). Tenant B: tom (admin).
 * root is a superuser with no memberships.
 */
export async function createHarness(
  options: { policy?: "open" | "closed"; workflow?: WorkflowDefinition | null } = {}
): Promise<Harness> {
  const store = new MemoryWorkflowStore();
  const identity = new MemoryIdentityProvider();
  const events: DomainEvent[] = [];
  let ticks = 0;

  identity.addTenant({ id: TENANT_A, slug: "acme", name: "Acme" });
  identity.addTenant({ id: TENANT_B, slug: "globex", name: "Globex" });
  for (const user of ["alice", "bob", "carol", "dave"]) {
    identity.addMembership(user, TENANT_A, "member", true);
  }
  identity.addMembership("mia", TENANT_A, "manager", true);
  identity.addMembership("ada", TENANT_A, "admin", true);
  identity.addMembership("vic", TENANT_A, "viewer", true);
  identity.addMembership("tom", TENANT_B, "admin", true);
  identity.addSuperuser("root");

  const core = createWorkflowCore({
    store,
    identity,
    policy: options.policy ?? "open",
    clock: () => new Date(CLOCK_START + ticks++ * 1000),
    publish: async (event) => {
      events.push(event);
    },
  });

  const workflow = options.workflow === undefined ? reviewWorkflow() : options.workflow;
  if (workflow) {
    await store.transaction(TENANT_A, (tx) => tx.saveWorkflow(workflow));
  }

  let itemCount = 0;

  return {
    store,
    identity,
    core,
    events,

    as: (userId, tenantId = TENANT_A) =>
      core.resolver.resolve({ userId, type: "human" }, tenantId),

    async seedItem(overrides = {}) {
      itemCount += 1;
      const created = new Date(CLOCK_START - 3_600_000 + itemCount * 1000);
      const item: WorkItem = {
        id: `item-${itemCount}`,
        tenantId: TENANT_A,
        projectId: PROJECT,
        key: null,
        title: `Expense claim ${itemCount}`,
        status: "draft",
        ownerId: "alice",
        ownerType: "user",
        archived: false,
        archivedAt: null,
        milestones: {},
        createdAt: created,
        updatedAt: created,
        ...overrides,
      };
      await store.transaction(item.tenantId, (tx) => tx.insertItem(item));
      return item;
    },

    async seedReviewers(itemId, reviewerIds) {
      const assignments = reviewerIds.map(
        (reviewerId, index): ReviewerAssignment => ({
          id: `${itemId}-rev-${reviewerId}`,
          tenantId: TENANT_A,
          workItemId: itemId,
          reviewerId,
          state: "pending",
          decidedAt: null,
          note: null,
          order: index + 1,
          createdAt: new Date(CLOCK_START - 1000),
        })
      );
      await store.transaction(TENANT_A, async (tx) => {
        for (const assignment of assignments) await tx.insertAssignment(assignment);
      });
      return assignments;
    },

    item: (itemId) => store.reader(TENANT_A).findItem(itemId),
  };
}
