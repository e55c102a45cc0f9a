/**
 * Workflow Definition Validation
 *
 * Checks a definition before it is saved. Collects every problem rather
 * than stopping at the first, so an admin can fix them in one pass.
 */

import type { WorkflowDefinition } from "@workgate/contracts";
import { WorkflowConfigError } from "../errors/index.js";

export function findWorkflowProblems(definition: WorkflowDefinition): string[] {
  const problems: string[] = [];
  const keys = new Set<string>();

  for (const status of definition.statuses) {
    if (keys.has(status.key)) {
      problems.push(`Status "${status.key}" is declared more than once`);
    }
    keys.add(status.key);
  }

  const initial = definition.statuses.filter((s) => s.initial);
  if (initial.length !== 1) {
    problems.push(`Exactly one initial status is required, found ${initial.length}`);
  }

  // -- Rules ---------------------------------------------------------------

  const seenEdges = new Set<string>();
  for (const rule of definition.rules) {
    const edge = `${rule.from} → ${rule.to}`;
    if (!keys.has(rule.from)) problems.push(`Rule ${edge}: unknown source status "${rule.from}"`);
    if (!keys.has(rule.to)) problems.push(`Rule ${edge}: unknown target status "${rule.to}"`);
    if (rule.from === rule.to) problems.push(`Rule ${edge}: a status cannot transition to itself`);
    if (seenEdges.has(edge)) problems.push(`Rule ${edge} is declared more than once`);
    seenEdges.add(edge);
  }

  const enabledEdges = new Set(
    definition.rules.filter((r) => r.enabled).map((r) => `${r.from} → ${r.to}`)
  );
  const hasOutgoing = (key: string): boolean =>
    definition.rules.some((r) => r.enabled && r.from === key);

  if (definition.rules.length > 0) {
    for (const status of definition.statuses) {
      if (!status.terminal && !hasOutgoing(status.key)) {
        problems.push(`Status "${status.key}" is not terminal but has no enabled outgoing rule`);
      }
    }
  }

  // -- Approval --------------------------------------------------------------

  const reviewable = definition.statuses.filter((s) => s.reviewable);
  const approval = definition.approval;

  if (!approval) {
    if (reviewable.length > 0) {
      problems.push("Reviewable statuses require an approval policy");
    }
    return problems;
  }

  const { approvedStatus, rejectedStatus } = approval;
  if (!keys.has(approvedStatus)) problems.push(`Approved status "${approvedStatus}" is not declared`);
  if (!keys.has(rejectedStatus)) problems.push(`Rejected status "${rejectedStatus}" is not declared`);
  if (approvedStatus === rejectedStatus) {
    problems.push("Approved and rejected statuses must differ");
  }
  if (reviewable.length === 0) {
    problems.push("An approval policy needs at least one reviewable status");
  }

  for (const status of reviewable) {
    if (status.key === approvedStatus || status.key === rejectedStatus) {
      problems.push(`Status "${status.key}" cannot be both reviewable and an approval outcome`);
    }
    if (definition.rules.length > 0) {
      for (const target of [approvedStatus, rejectedStatus]) {
        if (!enabledEdges.has(`${status.key} → ${target}`)) {
          problems.push(`Reviewable status "${status.key}" needs an enabled rule to "${target}"`);
        }
      }
    }
  }

  return problems;
}

/** Throws WorkflowConfigError listing every problem found. */
export function assertValidWorkflow(definition: WorkflowDefinition): void {
  const problems = findWorkflowProblems(definition);
  if (problems.length > 0) {
    throw new WorkflowConfigError(problems);
  }
}

export function initialStatus(definition: WorkflowDefinition): string {
  const status = definition.statuses.find((s) => s.initial) ?? definition.statuses[0];
  if (!status) {
    throw new WorkflowConfigError([`Workflow "${definition.name}" declares no statuses`]);
  }
  return status.key;
}

export function isReviewable(definition: WorkflowDefinition, statusKey: string): boolean {
  return definition.statuses.some((s) => s.key === statusKey && s.reviewable === true);
}
