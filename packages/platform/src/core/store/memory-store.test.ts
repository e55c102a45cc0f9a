/**
 * In-Memory Workflow Store — Test Suite
 *
 *   - staged writes are visible inside the transaction, invisible outside
 *   - a throw inside the work function discards every staged write
 *   - failOn() injects a one-shot PersistenceError
 *   - tenants never see each other's rows
 *   - returned values are copies
 *   - duplicate (item, reviewer) assignments are refused
 *   - audit reads come back newest first
 *   - a transaction that read a workflow holds it against withWorkflowLock
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { AuditEntry, ReviewerAssignment, WorkItem } from "@workgate/contracts";
import { MemoryWorkflowStore } from "./memory-store.js";
import { PersistenceError } from "../errors/index.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const NOW = new Date("2026-03-01T09:00:00.000Z");

function makeItem(overrides: Partial<WorkItem> = {}): WorkItem {
  return {
    id: "item-1",
    tenantId: "tenant-a",
    projectId: "proj-1",
    key: null,
    title: "Quarterly filing",
    status: "draft",
    ownerId: "alice",
    ownerType: "user",
    archived: false,
    archivedAt: null,
    milestones: {},
    createdAt: NOW,
    updatedAt: NOW,
    ...overrides,
  };
}

function makeAssignment(overrides: Partial<ReviewerAssignment> = {}): ReviewerAssignment {
  return {
    id: "asg-1",
    tenantId: "tenant-a",
    workItemId: "item-1",
    reviewerId: "bob",
    state: "pending",
    decidedAt: null,
    note: null,
    order: 1,
    createdAt: NOW,
    ...overrides,
  };
}

function makeAudit(id: string, overrides: Partial<AuditEntry> = {}): AuditEntry {
  return {
    id,
    tenantId: "tenant-a",
    actorId: "alice",
    action: "StatusChange",
    entityType: "WorkItem",
    entityId: "item-1",
    workItemId: "item-1",
    previousValue: null,
    newValue: null,
    note: null,
    metadata: {},
    createdAt: NOW,
    ...overrides,
  };
}

let store: MemoryWorkflowStore;

beforeEach(() => {
  store = new MemoryWorkflowStore();
});

// ---------------------------------------------------------------------------
// Commit and rollback
// ---------------------------------------------------------------------------

describe("transaction", () => {
  it("commits staged writes when the work resolves", async () => {
    await store.transaction("tenant-a", async (tx) => {
      await tx.insertItem(makeItem());
    });

    const item = await store.reader("tenant-a").findItem("item-1");
    expect(item?.title).toBe("Quarterly filing");
  });

  it("shows staged writes to the transaction itself before commit", async () => {
    await store.transaction("tenant-a", async (tx) => {
      await tx.insertItem(makeItem());

      expect(await tx.findItem("item-1")).not.toBeNull();
      expect(await store.reader("tenant-a").findItem("item-1")).toBeNull();
    });
  });

  it("discards every staged write when the work throws", async () => {
    await store.transaction("tenant-a", async (tx) => {
      await tx.insertItem(makeItem());
    });

    await expect(
      store.transaction("tenant-a", async (tx) => {
        await tx.updateItem(makeItem({ status: "submitted" }));
        await tx.appendAudit(makeAudit("audit-1"));
        throw new Error("validation failed late");
      })
    ).rejects.toThrow("validation failed late");

    const reader = store.reader("tenant-a");
    expect((await reader.findItem("item-1"))?.status).toBe("draft");
    expect((await reader.listAudit({})).total).toBe(0);
  });

  it("fails the next matching write once after failOn()", async () => {
    store.failOn("appendAudit");

    await expect(
      store.transaction("tenant-a", async (tx) => {
        await tx.insertItem(makeItem());
        await tx.appendAudit(makeAudit("audit-1"));
      })
    ).rejects.toBeInstanceOf(PersistenceError);

    expect(await store.reader("tenant-a").findItem("item-1")).toBeNull();

    await store.transaction("tenant-a", async (tx) => {
      await tx.insertItem(makeItem());
      await tx.appendAudit(makeAudit("audit-1"));
    });
    expect((await store.reader("tenant-a").listAudit({})).total).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Workflow locks
// ---------------------------------------------------------------------------

function settle(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe("workflow locks", () => {
  it("holds withWorkflowLock until a transaction that read the workflow commits", async () => {
    const log: string[] = [];
    let commit: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      commit = resolve;
    });

    const reading = store.transaction("tenant-a", async (tx) => {
      await tx.findWorkflow("proj-1");
      log.push("read");
      await gate;
      log.push("commit");
    });
    await settle();

    const saving = store.withWorkflowLock("tenant-a", "proj-1", async () => {
      log.push("save");
    });
    await settle();
    expect(log).toEqual(["read"]);

    commit();
    await Promise.all([reading, saving]);
    expect(log).toEqual(["read", "commit", "save"]);
  });

  it("makes a transaction's workflow read wait for an in-flight save", async () => {
    const log: string[] = [];
    let finish: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      finish = resolve;
    });

    const saving = store.withWorkflowLock("tenant-a", "proj-1", async () => {
      log.push("save:start");
      await gate;
      log.push("save:end");
    });
    await settle();

    const reading = store.transaction("tenant-a", async (tx) => {
      await tx.findWorkflow("proj-1");
      log.push("read");
    });
    await settle();
    expect(log).toEqual(["save:start"]);

    finish();
    await Promise.all([saving, reading]);
    expect(log).toEqual(["save:start", "save:end", "read"]);
  });

  it("lets one transaction read the same workflow twice", async () => {
    const reads = await store.transaction("tenant-a", async (tx) => {
      await tx.findWorkflow("proj-1");
      await tx.findWorkflow("proj-1");
      return 2;
    });
    expect(reads).toBe(2);
  });

  it("does not block lock-free readers", async () => {
    let finish: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      finish = resolve;
    });
    const saving = store.withWorkflowLock("tenant-a", "proj-1", () => gate);
    await settle();

    expect(await store.reader("tenant-a").findWorkflow("proj-1")).toBeNull();

    finish();
    await saving;
  });
});

// ---------------------------------------------------------------------------
// Isolation and copies
// ---------------------------------------------------------------------------

describe("tenant isolation", () => {
  it("hides one tenant's items from another", async () => {
    await store.transaction("tenant-a", async (tx) => {
      await tx.insertItem(makeItem());
    });

    expect(await store.reader("tenant-b").findItem("item-1")).toBeNull();
    expect(await store.reader("tenant-b").listItems({})).toEqual([]);
  });
});

describe("copies", () => {
  it("returns items that can be mutated without touching the store", async () => {
    await store.transaction("tenant-a", async (tx) => {
      await tx.insertItem(makeItem());
    });

    const copy = await store.reader("tenant-a").findItem("item-1");
    if (copy) copy.status = "completed";

    expect((await store.reader("tenant-a").findItem("item-1"))?.status).toBe("draft");
  });
});

// ---------------------------------------------------------------------------
// Assignments
// ---------------------------------------------------------------------------

describe("assignments", () => {
  it("refuses a second assignment of the same reviewer", async () => {
    await store.transaction("tenant-a", async (tx) => {
      await tx.insertAssignment(makeAssignment());
    });

    await expect(
      store.transaction("tenant-a", async (tx) => {
        await tx.insertAssignment(makeAssignment({ id: "asg-2" }));
      })
    ).rejects.toBeInstanceOf(PersistenceError);
  });

  it("lists assignments by order and drops deleted ones", async () => {
    await store.transaction("tenant-a", async (tx) => {
      await tx.insertAssignment(makeAssignment({ id: "asg-2", reviewerId: "carol", order: 2 }));
      await tx.insertAssignment(makeAssignment({ id: "asg-1", reviewerId: "bob", order: 1 }));
      await tx.insertAssignment(makeAssignment({ id: "asg-3", reviewerId: "dan", order: 3 }));
    });

    await store.transaction("tenant-a", async (tx) => {
      await tx.deleteAssignment("asg-2");
      const inside = await tx.listAssignments("item-1");
      expect(inside.map((a) => a.reviewerId)).toEqual(["bob", "dan"]);
    });

    const after = await store.reader("tenant-a").listAssignments("item-1");
    expect(after.map((a) => a.reviewerId)).toEqual(["bob", "dan"]);
  });
});

// ---------------------------------------------------------------------------
// Audit
// ---------------------------------------------------------------------------

describe("listAudit", () => {
  it("returns entries newest first with a total", async () => {
    await store.transaction("tenant-a", async (tx) => {
      await tx.appendAudit(makeAudit("audit-1"));
      await tx.appendAudit(makeAudit("audit-2", { action: "ReviewerApproved" }));
      await tx.appendAudit(makeAudit("audit-3"));
    });

    const page = await store.reader("tenant-a").listAudit({ limit: 2 });

    expect(page.total).toBe(3);
    expect(page.data.map((e) => e.id)).toEqual(["audit-3", "audit-2"]);
  });

  it("filters by action", async () => {
    await store.transaction("tenant-a", async (tx) => {
      await tx.appendAudit(makeAudit("audit-1"));
      await tx.appendAudit(makeAudit("audit-2", { action: "ReviewerApproved" }));
    });

    const page = await store.reader("tenant-a").listAudit({ action: "ReviewerApproved" });

    expect(page.data.map((e) => e.id)).toEqual(["audit-2"]);
  });
});
