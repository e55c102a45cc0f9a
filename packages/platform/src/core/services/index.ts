/**
 * Workflow Core
 *
 * Wires the resolver, engine, aggregator and supporting services over one
 * store and identity provider. Initialized once at startup (bootstrap.ts);
 * actions read it through getWorkflowCore().
 */

import type { IdentityProvider, TransitionPolicy, WorkflowStore } from "@workgate/contracts";
import { ApprovalAggregator } from "../approvals/index.js";
import { AuditRecorder, systemClock, type Clock } from "../audit/index.js";
import { createLogger } from "../action-bus/middleware/logging.js";
import { createEventSink, publish } from "../event-bus/index.js";
import { TenantContextResolver } from "../tenancy/index.js";
import { WorkItemService } from "../work-items/index.js";
import { WorkflowConfigService } from "../workflow/configuration.js";
import { StatusTransitionEngine, type EngineDependencies } from "../workflow/engine.js";

export interface WorkflowCoreOptions {
  store: WorkflowStore;
  identity: IdentityProvider;
  policy?: TransitionPolicy;
  clock?: Clock;

  /** Where committed events go; defaults to the event bus */
  publish?: typeof publish;
}

export interface WorkflowCore {
  store: WorkflowStore;
  identity: IdentityProvider;
  resolver: TenantContextResolver;
  engine: StatusTransitionEngine;
  approvals: ApprovalAggregator;
  workItems: WorkItemService;
  workflows: WorkflowConfigService;
}

export function createWorkflowCore(options: WorkflowCoreOptions): WorkflowCore {
  const clock = options.clock ?? systemClock;
  const deps: EngineDependencies = {
    store: options.store,
    identity: options.identity,
    audit: new AuditRecorder(clock),
    events: createEventSink(createLogger("events"), options.publish ?? publish),
    policy: options.policy ?? "open",
    clock,
  };

  const engine = new StatusTransitionEngine(deps);
  return {
    store: options.store,
    identity: options.identity,
    resolver: new TenantContextResolver(options.identity),
    engine,
    approvals: new ApprovalAggregator(deps, engine),
    workItems: new WorkItemService(deps),
    workflows: new WorkflowConfigService(deps),
  };
}

let core: WorkflowCore | null = null;

/** Builds the process-wide core. Call once at startup. */
export function initWorkflowCore(options: WorkflowCoreOptions): WorkflowCore {
  core = createWorkflowCore(options);
  return core;
}

/** Returns the core. Throws if initWorkflowCore() has not been called. */
export function getWorkflowCore(): WorkflowCore {
  if (!core) {
    throw new Error("Workflow core not initialized. Call initWorkflowCore() first.");
  }
  return core;
}

/** Drops the process-wide core. Used for test isolation. */
export function resetWorkflowCore(): void {
  core = null;
}
