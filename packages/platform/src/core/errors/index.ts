/**
 * Platform Errors
 *
 * Every failure the engine raises on purpose carries a stable `kind`.
 * The Action Bus turns the kind into a structured ActionResult and the REST
 * adapter turns it into an HTTP status. Nothing here crashes the process.
 *
 * Only persistence failures are retryable: every other kind is decided by
 * the inputs and will fail the same way again.
 */

export type ErrorKind =
  | "not_found"
  | "validation"
  | "permission"
  | "tenant_access_denied"
  | "no_tenant_selected"
  | "invalid_transition"
  | "not_in_reviewable_state"
  | "unknown_reviewer"
  | "already_decided"
  | "item_archived"
  | "workflow_config"
  | "persistence"
  | "unknown";

export abstract class PlatformError extends Error {
  abstract readonly kind: ErrorKind;

  get retryable(): boolean {
    return false;
  }

  /** Extra fields surfaced to callers as ActionResult.details */
  details(): Record<string, unknown> | undefined {
    return undefined;
  }
}

export class NotFoundError extends PlatformError {
  readonly kind = "not_found";

  constructor(
    public readonly entity: string,
    public readonly id: string
  ) {
    super(`${entity} "${id}" not found`);
    this.name = "NotFoundError";
  }
}

/** The principal may not act in the requested tenant. */
export class TenantAccessDeniedError extends PlatformError {
  readonly kind = "tenant_access_denied";

  constructor(
    public readonly tenantId: string,
    reason: "unknown_tenant" | "tenant_closed" | "not_a_member"
  ) {
    const why =
      reason === "unknown_tenant"
        ? "does not exist"
        : reason === "tenant_closed"
          ? "is inactive or archived"
          : "is not one of your tenants";
    super(`Access to tenant "${tenantId}" denied: tenant ${why}`);
    this.name = "TenantAccessDeniedError";
  }
}

/** No tenant was requested and none could be picked for the principal. */
export class NoTenantSelectedError extends PlatformError {
  readonly kind = "no_tenant_selected";

  constructor(public readonly userId: string) {
    super(`No tenant selected and "${userId}" has no accessible default tenant`);
    this.name = "NoTenantSelectedError";
  }
}

export class PermissionError extends PlatformError {
  readonly kind = "permission";

  constructor(
    public readonly userId: string,
    public readonly required: string
  ) {
    super(`User "${userId}" lacks the "${required}" permission for this operation`);
    this.name = "PermissionError";
  }
}

export type InvalidTransitionReason = "unknown_status" | "unchanged" | "no_rule";

/**
 * Thrown when a status change is not allowed by the project's workflow.
 * The item is left unmodified.
 */
export class InvalidTransitionError extends PlatformError {
  readonly kind = "invalid_transition";

  constructor(
    public readonly reason: InvalidTransitionReason,
    public readonly from: string,
    public readonly to: string,
    public readonly validTargets: string[]
  ) {
    const why =
      reason === "unknown_status"
        ? `"${to}" is not a status of this workflow`
        : reason === "unchanged"
          ? `the item is already "${to}"`
          : `"${from}" → "${to}" is not allowed`;
    super(
      `Invalid status transition: ${why}. ` +
        `Valid transitions from "${from}": [${validTargets.join(", ")}]`
    );
    this.name = "InvalidTransitionError";
  }

  override details(): Record<string, unknown> {
    return {
      reason: this.reason,
      from: this.from,
      to: this.to,
      validTargets: this.validTargets,
    };
  }
}

export class NotInReviewableStateError extends PlatformError {
  readonly kind = "not_in_reviewable_state";

  constructor(
    public readonly workItemId: string,
    public readonly status: string
  ) {
    super(`Work item "${workItemId}" is "${status}", which does not accept review decisions`);
    this.name = "NotInReviewableStateError";
  }

  override details(): Record<string, unknown> {
    return { status: this.status };
  }
}

export class UnknownReviewerError extends PlatformError {
  readonly kind = "unknown_reviewer";

  constructor(
    public readonly workItemId: string,
    public readonly reviewerId: string
  ) {
    super(`"${reviewerId}" is not a reviewer of work item "${workItemId}"`);
    this.name = "UnknownReviewerError";
  }
}

/**
 * The reviewer already decided in the current review round. A decision can
 * only be made again once the round is reset.
 */
export class AlreadyDecidedError extends PlatformError {
  readonly kind = "already_decided";

  constructor(
    public readonly workItemId: string,
    public readonly reviewerId: string,
    public readonly decision: "approved" | "rejected"
  ) {
    super(`"${reviewerId}" has already ${decision} work item "${workItemId}"`);
    this.name = "AlreadyDecidedError";
  }

  override details(): Record<string, unknown> {
    return { decision: this.decision };
  }
}

export class ItemArchivedError extends PlatformError {
  readonly kind = "item_archived";

  constructor(public readonly workItemId: string) {
    super(`Work item "${workItemId}" is archived and cannot be changed`);
    this.name = "ItemArchivedError";
  }
}

/** A workflow definition that would break the engine's invariants. */
export class WorkflowConfigError extends PlatformError {
  readonly kind = "workflow_config";

  constructor(public readonly problems: string[]) {
    super(`Invalid workflow configuration: ${problems.join("; ")}`);
    this.name = "WorkflowConfigError";
  }

  override details(): Record<string, unknown> {
    return { problems: this.problems };
  }
}

/**
 * The atomic commit failed. The operation must be treated as not having
 * happened; callers may retry it unchanged.
 */
export class PersistenceError extends PlatformError {
  readonly kind = "persistence";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
  }

  override get retryable(): boolean {
    return true;
  }
}
