/**
 * Workflow Configuration — Test Suite
 *
 *   - a valid definition is saved and audited
 *   - every problem is reported at once
 *   - dropping a status still held by an item is refused
 *   - a reconfiguration racing a transition or a creation never strands
 *     an item outside the saved status set
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { WorkflowDefinition, WorkItem } from "@workgate/contracts";
import { WorkflowConfigError } from "../errors/index.js";
import { createHarness, PROJECT, reviewWorkflow, TENANT_A, type Harness } from "../test-fixtures.js";

let h: Harness;

beforeEach(async () => {
  h = await createHarness({ workflow: null });
});

describe("configure", () => {
  it("saves the definition with a timestamp and audits it", async () => {
    const saved = await h.core.workflows.configure(await h.as("ada"), reviewWorkflow());

    expect(saved.updatedAt).toBeInstanceOf(Date);
    expect(await h.core.workflows.get(await h.as("vic"), PROJECT)).toEqual(saved);

    const { data } = await h.store.reader(TENANT_A).listAudit({ action: "WorkflowConfigured" });
    expect(data[0]).toMatchObject({
      entityType: "Workflow",
      entityId: PROJECT,
      workItemId: null,
      previousValue: null,
      newValue: "Expense approval",
      metadata: { statuses: 5, rules: 6, approval: true },
    });
  });

  it("reports every problem in one error", async () => {
    const broken = reviewWorkflow();
    broken.statuses = broken.statuses.map((s) => ({ ...s, initial: false }));
    broken.rules = broken.rules.filter((r) => !(r.from === "in_review" && r.to === "rejected"));

    let caught: unknown;
    try {
      await h.core.workflows.configure(await h.as("ada"), broken);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(WorkflowConfigError);
    expect(caught instanceof WorkflowConfigError && caught.problems).toEqual([
      "Exactly one initial status is required, found 0",
      'Reviewable status "in_review" needs an enabled rule to "rejected"',
    ]);
  });

  it("refuses to drop a status an item still holds", async () => {
    await h.core.workflows.configure(await h.as("ada"), reviewWorkflow());
    await h.seedItem({ status: "submitted" });

    const trimmed = reviewWorkflow();
    trimmed.statuses = trimmed.statuses.filter((s) => s.key !== "submitted");
    trimmed.rules = [
      { from: "draft", to: "in_review", enabled: true },
      ...trimmed.rules.filter((r) => r.from !== "submitted" && r.to !== "submitted"),
    ];

    await expect(h.core.workflows.configure(await h.as("ada"), trimmed)).rejects.toMatchObject({
      problems: ['Status "submitted" is still in use by work items'],
    });
    expect((await h.core.workflows.get(await h.as("ada"), PROJECT)).statuses).toHaveLength(5);
  });
});

// ---------------------------------------------------------------------------
// Concurrency
// ---------------------------------------------------------------------------

/** Only draft and done: drops every status a submitted item could hold */
function draftAndDone(): WorkflowDefinition {
  return {
    projectId: PROJECT,
    name: "Two step",
    statuses: [
      { key: "draft", label: "Draft", category: "todo", initial: true },
      { key: "done", label: "Done", category: "done", terminal: true },
    ],
    rules: [{ from: "draft", to: "done", enabled: true }],
  };
}

async function assertStatusesConfigured(items: (WorkItem | null)[]): Promise<void> {
  const workflow = await h.core.workflows.get(await h.as("ada"), PROJECT);
  const keys = workflow.statuses.map((s) => s.key);
  for (const item of items) {
    expect(keys).toContain(item?.status);
  }
}

describe("configure under concurrency", () => {
  beforeEach(async () => {
    await h.core.workflows.configure(await h.as("ada"), reviewWorkflow());
  });

  it("serializes with a transition that leaves the new status set", async () => {
    const item = await h.seedItem();
    const alice = await h.as("alice");
    const ada = await h.as("ada");

    const results = await Promise.allSettled([
      h.core.engine.transition(alice, { itemId: item.id, targetStatus: "submitted" }),
      h.core.workflows.configure(ada, draftAndDone()),
    ]);

    expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(1);
    await assertStatusesConfigured([await h.item(item.id)]);
  });

  it("serializes with a creation in a status the new set drops", async () => {
    const alice = await h.as("alice");
    const ada = await h.as("ada");

    const results = await Promise.allSettled([
      h.core.workItems.create(alice, { projectId: PROJECT, title: "Taxi", status: "submitted" }),
      h.core.workflows.configure(ada, draftAndDone()),
    ]);

    expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(1);
    const items = await h.store.reader(TENANT_A).listItems({ projectId: PROJECT });
    await assertStatusesConfigured(items);
  });

  it("lets transitions on different items proceed once the save is done", async () => {
    const first = await h.seedItem();
    const second = await h.seedItem();
    const alice = await h.as("alice");

    await Promise.all([
      h.core.workflows.configure(await h.as("ada"), reviewWorkflow()),
      h.core.engine.transition(alice, { itemId: first.id, targetStatus: "submitted" }),
      h.core.engine.transition(alice, { itemId: second.id, targetStatus: "submitted" }),
    ]);

    expect((await h.item(first.id))?.status).toBe("submitted");
    expect((await h.item(second.id))?.status).toBe("submitted");
  });
});
