/**
 * Database Schema
 *
 * Drizzle table definitions for the workflow engine. Every tenant-owned
 * table carries tenant_id and every query filters on it.
 *
 * migrate.ts creates the same tables with plain DDL; keep the two in step.
 */

import { sql } from "drizzle-orm";
import {
  bigserial,
  boolean,
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  varchar,
} from "drizzle-orm/pg-core";
import {
  AUDIT_ACTIONS,
  AUDIT_ENTITY_TYPES,
  TENANT_ROLES,
  type ApprovalPolicy,
  type MilestoneKey,
  type StatusTransitionRule,
  type WorkflowStatus,
} from "@workgate/contracts";

const REVIEW_STATES = ["pending", "approved", "rejected"] as const;
const OWNER_TYPES = ["user", "team"] as const;

/**
 * Tenants - top-level organizational unit
 */
export const tenants = pgTable("tenants", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  slug: text("slug").notNull().unique(),
  name: text("name").notNull(),
  isActive: boolean("is_active").notNull().default(true),
  isArchived: boolean("is_archived").notNull().default(false),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
});

export const users = pgTable("users", {
  id: varchar("id").primaryKey(),
  email: text("email").unique(),
  displayName: text("display_name"),
  isSuperuser: boolean("is_superuser").notNull().default(false),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
});

export const tenantMemberships = pgTable("tenant_memberships", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  tenantId: varchar("tenant_id").notNull().references(() => tenants.id),
  userId: varchar("user_id").notNull().references(() => users.id),
  role: text("role", { enum: TENANT_ROLES }).notNull(),
  isDefault: boolean("is_default").notNull().default(false),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  uniqueIndex("tenant_memberships_tenant_user_idx").on(table.tenantId, table.userId),
  index("tenant_memberships_user_idx").on(table.userId),
]);

export const teamMembers = pgTable("team_members", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  tenantId: varchar("tenant_id").notNull().references(() => tenants.id),
  teamId: varchar("team_id").notNull(),
  userId: varchar("user_id").notNull().references(() => users.id),
}, (table) => [
  uniqueIndex("team_members_team_user_idx").on(table.tenantId, table.teamId, table.userId),
]);

/**
 * Workflows - one definition per (tenant, project); statuses and rules
 * are stored as JSON documents.
 */
export const workflows = pgTable("workflows", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  tenantId: varchar("tenant_id").notNull().references(() => tenants.id),
  projectId: varchar("project_id").notNull(),
  name: text("name").notNull(),
  statuses: jsonb("statuses").$type<WorkflowStatus[]>().notNull(),
  rules: jsonb("rules").$type<StatusTransitionRule[]>().notNull(),
  approval: jsonb("approval").$type<ApprovalPolicy>(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  uniqueIndex("workflows_tenant_project_idx").on(table.tenantId, table.projectId),
]);

export const workItems = pgTable("work_items", {
  id: varchar("id").primaryKey(),
  tenantId: varchar("tenant_id").notNull().references(() => tenants.id),
  projectId: varchar("project_id").notNull(),
  key: text("key"),
  title: text("title").notNull(),
  status: text("status").notNull(),
  ownerId: varchar("owner_id"),
  ownerType: text("owner_type", { enum: OWNER_TYPES }).notNull().default("user"),
  archived: boolean("archived").notNull().default(false),
  archivedAt: timestamp("archived_at", { withTimezone: true }),
  /** Milestone timestamps as ISO strings */
  milestones: jsonb("milestones").$type<Partial<Record<MilestoneKey, string>>>().notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index("work_items_tenant_project_idx").on(table.tenantId, table.projectId),
  index("work_items_tenant_status_idx").on(table.tenantId, table.status),
]);

export const reviewerAssignments = pgTable("reviewer_assignments", {
  id: varchar("id").primaryKey(),
  tenantId: varchar("tenant_id").notNull().references(() => tenants.id),
  workItemId: varchar("work_item_id").notNull().references(() => workItems.id),
  reviewerId: varchar("reviewer_id").notNull(),
  state: text("state", { enum: REVIEW_STATES }).notNull().default("pending"),
  decidedAt: timestamp("decided_at", { withTimezone: true }),
  note: text("note"),
  position: integer("position").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  uniqueIndex("reviewer_assignments_item_reviewer_idx").on(table.workItemId, table.reviewerId),
  index("reviewer_assignments_tenant_idx").on(table.tenantId),
]);

/**
 * Comments on work items - append-only, read oldest first.
 */
export const workItemComments = pgTable("work_item_comments", {
  id: varchar("id").primaryKey(),
  /** Insertion order; breaks created_at ties */
  seq: bigserial("seq", { mode: "number" }).notNull(),
  tenantId: varchar("tenant_id").notNull().references(() => tenants.id),
  workItemId: varchar("work_item_id").notNull().references(() => workItems.id),
  authorId: varchar("author_id").notNull(),
  content: text("content").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index("work_item_comments_item_idx").on(table.tenantId, table.workItemId),
]);

/**
 * Audit entries - append-only. No code path updates or deletes rows.
 */
export const auditEntries = pgTable("audit_entries", {
  id: varchar("id").primaryKey(),
  /** Insertion order; breaks created_at ties */
  seq: bigserial("seq", { mode: "number" }).notNull(),
  tenantId: varchar("tenant_id").notNull().references(() => tenants.id),
  actorId: varchar("actor_id").notNull(),
  action: text("action", { enum: AUDIT_ACTIONS }).notNull(),
  entityType: text("entity_type", { enum: AUDIT_ENTITY_TYPES }).notNull(),
  entityId: varchar("entity_id").notNull(),
  workItemId: varchar("work_item_id"),
  previousValue: text("previous_value"),
  newValue: text("new_value"),
  note: text("note"),
  metadata: jsonb("metadata").$type<Record<string, unknown>>().notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index("audit_entries_tenant_created_idx").on(table.tenantId, table.createdAt),
  index("audit_entries_work_item_idx").on(table.workItemId),
]);
