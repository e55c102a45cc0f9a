/**
 * @workgate/contracts
 *
 * Public API — the shared boundary between platform and domain.
 * Both sides import from this package. Neither imports from the other.
 */

// Actions
export type { ActionDefinition, ActionExample } from "./action.js";
export { defineAction } from "./action.js";

// Context (provided by platform to actions)
export type {
  ActionContext,
  Caller,
  Logger,
  DomainEvent,
  EventSubscriber,
} from "./context.js";

// Permissions
export type {
  CallerType,
  Capability,
  ItemRelation,
  TenantRole,
  TransitionActor,
} from "./permission.js";
export { ROLE_CAPABILITIES, TENANT_ROLES, roleGrants } from "./permission.js";

// Tenancy
export type {
  IdentityProvider,
  Principal,
  Tenant,
  TenantContext,
  TenantMembership,
} from "./tenant.js";
export { isTenantOpen } from "./tenant.js";

// Workflows
export type {
  ApprovalPolicy,
  MilestoneKey,
  StatusCategory,
  StatusTransitionRule,
  TransitionPolicy,
  WorkflowDefinition,
  WorkflowInput,
  WorkflowStatus,
  WorkflowTemplate,
} from "./workflow.js";
export {
  MILESTONE_KEYS,
  approvalPolicySchema,
  defineWorkflowTemplate,
  statusTransitionRuleSchema,
  workflowInputSchema,
  workflowStatusSchema,
} from "./workflow.js";

// Work items and reviews
export type {
  ApprovalAggregate,
  ApprovalCount,
  ApprovalSummary,
  OwnerType,
  ReviewDecision,
  ReviewState,
  ReviewerAssignment,
  WorkItem,
  WorkItemComment,
} from "./work-item.js";

// Audit
export type {
  AuditAction,
  AuditDraft,
  AuditEntityType,
  AuditEntry,
  AuditQuery,
  AuditQueryResult,
} from "./audit.js";
export { AUDIT_ACTIONS, AUDIT_ENTITY_TYPES } from "./audit.js";

// Events
export type {
  ItemStatusChangedPayload,
  ReviewerDecisionRecordedPayload,
  WorkItemEventType,
} from "./events.js";
export {
  WORK_ITEM_EVENTS,
  itemStatusChanged,
  reviewerDecisionRecorded,
} from "./events.js";

// Persistence
export type {
  WorkflowReader,
  WorkflowStore,
  WorkflowTransaction,
  WorkItemFilter,
} from "./store.js";

// Authentication
export type { AuthProvider, AuthResult } from "./auth.js";
