/**
 * @workgate/platform
 *
 * The workflow engine: tenant context resolution, status transitions,
 * approval aggregation and audit, plus the Action Bus, stores and the
 * REST adapter that drive it.
 */

// Config
export { loadConfig, type AppConfig } from "./core/config/index.js";

// Errors
export {
  PlatformError,
  NotFoundError,
  TenantAccessDeniedError,
  NoTenantSelectedError,
  PermissionError,
  InvalidTransitionError,
  NotInReviewableStateError,
  UnknownReviewerError,
  ItemArchivedError,
  AlreadyDecidedError,
  WorkflowConfigError,
  PersistenceError,
  type ErrorKind,
  type InvalidTransitionReason,
} from "./core/errors/index.js";

// Core services
export {
  createWorkflowCore,
  initWorkflowCore,
  getWorkflowCore,
  resetWorkflowCore,
  type WorkflowCore,
  type WorkflowCoreOptions,
} from "./core/services/index.js";
export { checkCapability, TenantContextResolver, MemoryIdentityProvider, type CapabilityDecision } from "./core/tenancy/index.js";
export {
  StatusTransitionEngine,
  type AppliedTransition,
  type EngineDependencies,
  type TransitionOrigin,
  type TransitionRequest,
} from "./core/workflow/engine.js";
export { TransitionGraph } from "./core/workflow/graph.js";
export { findWorkflowProblems, assertValidWorkflow, initialStatus, isReviewable } from "./core/workflow/validate.js";
export { WorkflowConfigService } from "./core/workflow/configuration.js";
export * from "./core/approvals/index.js";
export {
  WorkItemService,
  type AddCommentRequest,
  type CreateWorkItemRequest,
} from "./core/work-items/index.js";
export {
  AuditRecorder,
  systemClock,
  queryAuditTrail,
  buildItemTimeline,
  type Clock,
  type TimelineEvent,
} from "./core/audit/index.js";

// Stores
export { MemoryWorkflowStore, type MemoryWriteOperation } from "./core/store/memory-store.js";
export { KeyedMutex } from "./core/store/keyed-mutex.js";

// Database
export { initDatabase, getDatabase, closeDatabase, type Database, type SqlClient } from "./core/database/connection.js";
export { PostgresWorkflowStore } from "./core/database/postgres-store.js";
export { PostgresIdentityProvider } from "./core/database/postgres-identity.js";
export { runMigrations, TABLE_MIGRATIONS } from "./core/database/migrate.js";
export * as schema from "./core/database/schema.js";

// Action Bus
export { dispatch, type ActionResult, type ActionErrorType } from "./core/action-bus/bus.js";
export { registerAction, registerActions, getAction, getAllActions, getActionsInNamespace, clearActionRegistry } from "./core/action-bus/registry.js";
export { ValidationError, type FieldError } from "./core/action-bus/middleware/validation.js";
export { createLogger } from "./core/action-bus/middleware/logging.js";
export { coreActions } from "./core/actions/index.js";

// Event Bus
export { subscribe, subscribeAll, publish, getSubscriberCount, clearSubscribers } from "./core/event-bus/index.js";

// Authentication
export { initAuthProvider, getAuthProvider, setAuthProvider, resetAuthProvider } from "./auth/index.js";
export { SupabaseAuthProvider, createSupabaseAuthProvider } from "./auth/supabase-provider.js";
export { DevAuthProvider, DEV_USER_ID } from "./auth/dev-provider.js";

// Observability
export {
  initObservability,
  captureException,
  captureMessage,
  subjectTags,
  flushObservability,
  getObservabilityProvider,
  setObservabilityProvider,
  resetObservability,
  ConsoleObservabilityProvider,
  SentryObservabilityProvider,
  type ObservabilityProvider,
  type CaptureContext,
  type ObservabilitySeverity,
} from "./core/observability/index.js";

// Adapters
export { registerRESTRoutes, ERROR_TYPE_TO_STATUS } from "./adapters/rest/adapter.js";
export { authMiddleware, TENANT_HEADER } from "./adapters/rest/auth-middleware.js";
