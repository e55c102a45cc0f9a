/**
 * Transition Graph
 *
 * Adjacency view of a workflow's enabled rules, keyed by source status.
 * Cycles are ordinary here (rework loops), so nothing walks the graph;
 * every question is a single edge lookup.
 */

import type {
  StatusTransitionRule,
  TransitionPolicy,
  WorkflowDefinition,
  WorkflowStatus,
} from "@workgate/contracts";
import { InvalidTransitionError } from "../errors/index.js";

export class TransitionGraph {
  private readonly statuses = new Map<string, WorkflowStatus>();
  private readonly adjacency = new Map<string, Map<string, StatusTransitionRule>>();

  /** True when no rules are configured at all and the policy is open */
  readonly unrestricted: boolean;

  constructor(
    private readonly workflow: WorkflowDefinition,
    policy: TransitionPolicy
  ) {
    for (const status of workflow.statuses) {
      this.statuses.set(status.key, status);
    }
    for (const rule of workflow.rules) {
      if (!rule.enabled) continue;
      const edges = this.adjacency.get(rule.from) ?? new Map<string, StatusTransitionRule>();
      edges.set(rule.to, rule);
      this.adjacency.set(rule.from, edges);
    }
    this.unrestricted = workflow.rules.length === 0 && policy === "open";
  }

  status(key: string): WorkflowStatus | undefined {
    return this.statuses.get(key);
  }

  /** Statuses reachable in one step, in the workflow's declared order. */
  targetsFrom(from: string): string[] {
    if (this.unrestricted) {
      return this.workflow.statuses.map((s) => s.key).filter((key) => key !== from);
    }
    const edges = this.adjacency.get(from);
    if (!edges) return [];
    return this.workflow.statuses.map((s) => s.key).filter((key) => edges.has(key));
  }

  /**
   * Returns the rule that permits from → to (undefined when the graph is
   * unrestricted). Throws InvalidTransitionError otherwise.
   */
  check(from: string, to: string): StatusTransitionRule | undefined {
    if (!this.statuses.has(to)) {
      throw new InvalidTransitionError("unknown_status", from, to, this.targetsFrom(from));
    }
    if (from === to) {
      throw new InvalidTransitionError("unchanged", from, to, this.targetsFrom(from));
    }
    if (this.unrestricted) {
      return undefined;
    }

    const rule = this.adjacency.get(from)?.get(to);
    if (!rule) {
      throw new InvalidTransitionError("no_rule", from, to, this.targetsFrom(from));
    }
    return rule;
  }
}
