/**
 * Action Registry — Test Suite
 *
 * Validates action registration, lookup, and uniqueness enforcement.
 * If registration breaks, no action can be dispatched.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { z } from "zod";
import type { ActionDefinition } from "@workgate/contracts";
import {
  registerAction,
  registerActions,
  getAction,
  getAllActions,
  getActionsInNamespace,
  clearActionRegistry,
} from "./registry.js";

function createTestAction(overrides: Partial<ActionDefinition> = {}): ActionDefinition {
  return {
    id: "test.action",
    name: "Test Action",
    description: "Echoes its input",
    inputSchema: z.object({ value: z.string() }),
    capability: "view",
    idempotent: true,
    execute: async (input) => input,
    ...overrides,
  };
}

beforeEach(() => {
  clearActionRegistry();
});

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

describe("registerAction", () => {
  it("registers an action under its ID", () => {
    const action = createTestAction({ id: "review.decide" });
    registerAction(action);

    expect(getAction("review.decide")).toBe(action);
  });

  it("throws when an ID is registered twice", () => {
    registerAction(createTestAction({ id: "review.decide" }));

    expect(() => registerAction(createTestAction({ id: "review.decide", name: "Again" }))).toThrow(
      'Action "review.decide" is already registered'
    );
  });
});

describe("registerActions", () => {
  it("stops at the first duplicate", () => {
    registerAction(createTestAction({ id: "workItem.create" }));

    expect(() =>
      registerActions([
        createTestAction({ id: "workItem.create" }),
        createTestAction({ id: "workItem.archive" }),
      ])
    ).toThrow();
    expect(getAction("workItem.archive")).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// Lookup
// ---------------------------------------------------------------------------

describe("getAction / getAllActions", () => {
  it("returns undefined for an unknown ID", () => {
    expect(getAction("workItem.delete")).toBeUndefined();
  });

  it("lists every registered action", () => {
    registerActions([createTestAction({ id: "a.one" }), createTestAction({ id: "b.two" })]);
    expect(getAllActions().map((a) => a.id)).toEqual(["a.one", "b.two"]);
  });
});

describe("getActionsInNamespace", () => {
  it("matches on the ID prefix up to the dot", () => {
    registerActions([
      createTestAction({ id: "review.assign" }),
      createTestAction({ id: "review.decide" }),
      createTestAction({ id: "reviewer.stats" }),
      createTestAction({ id: "workItem.get" }),
    ]);

    expect(getActionsInNamespace("review").map((a) => a.id)).toEqual([
      "review.assign",
      "review.decide",
    ]);
  });
});

describe("clearActionRegistry", () => {
  it("removes every action", () => {
    registerAction(createTestAction({ id: "test.one" }));
    clearActionRegistry();
    expect(getAllActions()).toHaveLength(0);
  });
});
