/**
 * Work Item Service
 *
 * Creates, reads, archives and comments on work items. Status changes go
 * through the engine or the aggregator, never through here.
 */

import {
  WORK_ITEM_EVENTS,
  type OwnerType,
  type TenantContext,
  type WorkItem,
  type WorkItemComment,
  type WorkItemFilter,
} from "@workgate/contracts";
import { buildItemTimeline, type TimelineEvent } from "../audit/index.js";
import { InvalidTransitionError } from "../errors/index.js";
import {
  assertNotArchived,
  requireItem,
  requireWorkflow,
  type EngineDependencies,
} from "../workflow/engine.js";
import { initialStatus } from "../workflow/validate.js";

export interface CreateWorkItemRequest {
  projectId: string;
  title: string;
  key?: string | null;
  ownerId?: string | null;
  ownerType?: OwnerType;

  /** Defaults to the workflow's initial status */
  status?: string;
}

export interface AddCommentRequest {
  itemId: string;
  content: string;
}

/** Longest history returned by history() */
const HISTORY_LIMIT = 200;

/** Characters of a comment kept in its audit entry */
const COMMENT_EXCERPT = 100;

export class WorkItemService {
  constructor(private readonly deps: EngineDependencies) {}

  async create(context: TenantContext, request: CreateWorkItemRequest): Promise<WorkItem> {
    const id = crypto.randomUUID();
    const tenantId = context.tenant.id;

    const item = await this.deps.store.withItemLock(tenantId, id, async (tx) => {
      const workflow = await requireWorkflow(tx, request.projectId);
      const status = request.status ?? initialStatus(workflow);

      if (!workflow.statuses.some((s) => s.key === status)) {
        throw new InvalidTransitionError(
          "unknown_status",
          "",
          status,
          workflow.statuses.map((s) => s.key)
        );
      }

      const now = this.deps.clock();
      const created: WorkItem = {
        id,
        tenantId,
        projectId: request.projectId,
        key: request.key ?? null,
        title: request.title,
        status,
        ownerId: request.ownerId ?? context.principal.userId,
        ownerType: request.ownerType ?? "user",
        archived: false,
        archivedAt: null,
        milestones: {},
        createdAt: now,
        updatedAt: now,
      };

      await tx.insertItem(created);
      await this.deps.audit.record(tx, {
        tenantId,
        actorId: context.principal.userId,
        action: "ItemCreated",
        entityType: "WorkItem",
        entityId: id,
        workItemId: id,
        previousValue: null,
        newValue: status,
        note: null,
        metadata: { projectId: request.projectId, title: request.title },
      });
      return created;
    });

    this.deps.events([
      {
        type: WORK_ITEM_EVENTS.created,
        payload: { tenantId, workItemId: item.id, projectId: item.projectId, status: item.status },
      },
    ]);
    return item;
  }

  /** Archiving an archived item returns it unchanged. */
  async archive(context: TenantContext, itemId: string): Promise<WorkItem> {
    const tenantId = context.tenant.id;

    const { item, changed } = await this.deps.store.withItemLock(tenantId, itemId, async (tx) => {
      const current = await requireItem(tx, itemId);
      if (current.archived) {
        return { item: current, changed: false };
      }

      const now = this.deps.clock();
      const archived: WorkItem = { ...current, archived: true, archivedAt: now, updatedAt: now };
      await tx.updateItem(archived);
      await this.deps.audit.record(tx, {
        tenantId,
        actorId: context.principal.userId,
        action: "ItemArchived",
        entityType: "WorkItem",
        entityId: itemId,
        workItemId: itemId,
        previousValue: current.status,
        newValue: null,
        note: null,
        metadata: {},
      });
      return { item: archived, changed: true };
    });

    if (changed) {
      this.deps.events([
        { type: WORK_ITEM_EVENTS.archived, payload: { tenantId, workItemId: itemId } },
      ]);
    }
    return item;
  }

  async get(context: TenantContext, itemId: string): Promise<WorkItem> {
    return requireItem(this.deps.store.reader(context.tenant.id), itemId);
  }

  async list(context: TenantContext, filter: WorkItemFilter = {}): Promise<WorkItem[]> {
    return this.deps.store.reader(context.tenant.id).listItems(filter);
  }

  /**
   * Appends a comment by the caller. Archived items take no comments.
   *
   * @throws NotFoundError, ItemArchivedError, PersistenceError
   */
  async addComment(context: TenantContext, request: AddCommentRequest): Promise<WorkItemComment> {
    const tenantId = context.tenant.id;
    const authorId = context.principal.userId;

    const comment = await this.deps.store.withItemLock(tenantId, request.itemId, async (tx) => {
      const item = await requireItem(tx, request.itemId);
      assertNotArchived(item);

      const added: WorkItemComment = {
        id: crypto.randomUUID(),
        tenantId,
        workItemId: item.id,
        authorId,
        content: request.content,
        createdAt: this.deps.clock(),
      };
      await tx.insertComment(added);
      await this.deps.audit.record(tx, {
        tenantId,
        actorId: authorId,
        action: "CommentAdded",
        entityType: "Comment",
        entityId: added.id,
        workItemId: item.id,
        previousValue: null,
        newValue: added.content.slice(0, COMMENT_EXCERPT),
        note: null,
        metadata: {},
      });
      return added;
    });

    this.deps.events([
      {
        type: WORK_ITEM_EVENTS.commentAdded,
        payload: { tenantId, workItemId: comment.workItemId, commentId: comment.id, authorId },
      },
    ]);
    return comment;
  }

  /** Oldest first. */
  async listComments(context: TenantContext, itemId: string): Promise<WorkItemComment[]> {
    const reader = this.deps.store.reader(context.tenant.id);
    await requireItem(reader, itemId);
    return reader.listComments(itemId);
  }

  /** The item's audit trail as a timeline, oldest first. */
  async history(context: TenantContext, itemId: string): Promise<TimelineEvent[]> {
    const reader = this.deps.store.reader(context.tenant.id);
    await requireItem(reader, itemId);
    const { data } = await reader.listAudit({ workItemId: itemId, limit: HISTORY_LIMIT });
    return buildItemTimeline(data);
  }
}
