/**
 * Migration Runner
 *
 * Creates the workflow engine's tables with plain DDL. Idempotent: a table
 * that already exists is left untouched, and indexes use IF NOT EXISTS.
 *
 * The columns here must match the Drizzle definitions in schema.ts.
 * Columns are never dropped or retyped automatically.
 */

import { createLogger } from "../action-bus/middleware/logging.js";
import { getDatabase } from "./connection.js";

const logger = createLogger("migrate");

/** The part of the postgres.js client the runner uses */
export interface MigrationClient {
  unsafe(query: string, parameters?: string[]): PromiseLike<{ length: number }>;
}

export interface TableMigration {
  table: string;
  create: string;
  indexes: string[];
}

/** In dependency order: referenced tables come first. */
export const TABLE_MIGRATIONS: TableMigration[] = [
  {
    table: "tenants",
    create: `
      CREATE TABLE tenants (
        id VARCHAR PRIMARY KEY DEFAULT gen_random_uuid(),
        slug TEXT NOT NULL UNIQUE,
        name TEXT NOT NULL,
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        is_archived BOOLEAN NOT NULL DEFAULT FALSE,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
    indexes: [],
  },
  {
    table: "users",
    create: `
      CREATE TABLE users (
        id VARCHAR PRIMARY KEY,
        email TEXT UNIQUE,
        display_name TEXT,
        is_superuser BOOLEAN NOT NULL DEFAULT FALSE,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
    indexes: [],
  },
  {
    table: "tenant_memberships",
    create: `
      CREATE TABLE tenant_memberships (
        id VARCHAR PRIMARY KEY DEFAULT gen_random_uuid(),
        tenant_id VARCHAR NOT NULL REFERENCES tenants(id),
        user_id VARCHAR NOT NULL REFERENCES users(id),
        role TEXT NOT NULL,
        is_default BOOLEAN NOT NULL DEFAULT FALSE,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
    indexes: [
      `CREATE UNIQUE INDEX IF NOT EXISTS tenant_memberships_tenant_user_idx ON tenant_memberships(tenant_id, user_id)`,
      `CREATE INDEX IF NOT EXISTS tenant_memberships_user_idx ON tenant_memberships(user_id)`,
    ],
  },
  {
    table: "team_members",
    create: `
      CREATE TABLE team_members (
        id VARCHAR PRIMARY KEY DEFAULT gen_random_uuid(),
        tenant_id VARCHAR NOT NULL REFERENCES tenants(id),
        team_id VARCHAR NOT NULL,
        user_id VARCHAR NOT NULL REFERENCES users(id)
      )`,
    indexes: [
      `CREATE UNIQUE INDEX IF NOT EXISTS team_members_team_user_idx ON team_members(tenant_id, team_id, user_id)`,
    ],
  },
  {
    table: "workflows",
    create: `
      CREATE TABLE workflows (
        id VARCHAR PRIMARY KEY DEFAULT gen_random_uuid(),
        tenant_id VARCHAR NOT NULL REFERENCES tenants(id),
        project_id VARCHAR NOT NULL,
        name TEXT NOT NULL,
        statuses JSONB NOT NULL,
        rules JSONB NOT NULL,
        approval JSONB,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
    indexes: [
      `CREATE UNIQUE INDEX IF NOT EXISTS workflows_tenant_project_idx ON workflows(tenant_id, project_id)`,
    ],
  },
  {
    table: "work_items",
    create: `
      CREATE TABLE work_items (
        id VARCHAR PRIMARY KEY,
        tenant_id VARCHAR NOT NULL REFERENCES tenants(id),
        project_id VARCHAR NOT NULL,
        key TEXT,
        title TEXT NOT NULL,
        status TEXT NOT NULL,
        owner_id VARCHAR,
        owner_type TEXT NOT NULL DEFAULT 'user',
        archived BOOLEAN NOT NULL DEFAULT FALSE,
        archived_at TIMESTAMPTZ,
        milestones JSONB NOT NULL DEFAULT '{}'::jsonb,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
    indexes: [
      `CREATE INDEX IF NOT EXISTS work_items_tenant_project_idx ON work_items(tenant_id, project_id)`,
      `CREATE INDEX IF NOT EXISTS work_items_tenant_status_idx ON work_items(tenant_id, status)`,
    ],
  },
  {
    table: "reviewer_assignments",
    create: `
      CREATE TABLE reviewer_assignments (
        id VARCHAR PRIMARY KEY,
        tenant_id VARCHAR NOT NULL REFERENCES tenants(id),
        work_item_id VARCHAR NOT NULL REFERENCES work_items(id),
        reviewer_id VARCHAR NOT NULL,
        state TEXT NOT NULL DEFAULT 'pending',
        decided_at TIMESTAMPTZ,
        note TEXT,
        position INTEGER NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
    indexes: [
      `CREATE UNIQUE INDEX IF NOT EXISTS reviewer_assignments_item_reviewer_idx ON reviewer_assignments(work_item_id, reviewer_id)`,
      `CREATE INDEX IF NOT EXISTS reviewer_assignments_tenant_idx ON reviewer_assignments(tenant_id)`,
    ],
  },
  {
    table: "work_item_comments",
    create: `
      CREATE TABLE work_item_comments (
        id VARCHAR PRIMARY KEY,
        seq BIGSERIAL NOT NULL,
        tenant_id VARCHAR NOT NULL REFERENCES tenants(id),
        work_item_id VARCHAR NOT NULL REFERENCES work_items(id),
        author_id VARCHAR NOT NULL,
        content TEXT NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
    indexes: [
      `CREATE INDEX IF NOT EXISTS work_item_comments_item_idx ON work_item_comments(tenant_id, work_item_id)`,
    ],
  },
  {
    table: "audit_entries",
    create: `
      CREATE TABLE audit_entries (
        id VARCHAR PRIMARY KEY,
        seq BIGSERIAL NOT NULL,
        tenant_id VARCHAR NOT NULL REFERENCES tenants(id),
        actor_id VARCHAR NOT NULL,
        action TEXT NOT NULL,
        entity_type TEXT NOT NULL,
        entity_id VARCHAR NOT NULL,
        work_item_id VARCHAR,
        previous_value TEXT,
        new_value TEXT,
        note TEXT,
        metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
    indexes: [
      `CREATE INDEX IF NOT EXISTS audit_entries_tenant_created_idx ON audit_entries(tenant_id, created_at DESC)`,
      `CREATE INDEX IF NOT EXISTS audit_entries_work_item_idx ON audit_entries(work_item_id)`,
    ],
  },
];

/**
 * Checks whether a table exists in the public schema.
 */
export async function tableExists(pgSql: MigrationClient, tableName: string): Promise<boolean> {
  const rows = await pgSql.unsafe(
    `SELECT 1 FROM information_schema.tables WHERE table_schema = 'public' AND table_name = $1 LIMIT 1`,
    [tableName]
  );
  return rows.length > 0;
}

/**
 * Creates every missing table, then ensures its indexes.
 *
 * @returns the names of the tables created by this run
 */
export async function runMigrations(pgSql: MigrationClient = getDatabase().sql): Promise<string[]> {
  const created: string[] = [];

  for (const migration of TABLE_MIGRATIONS) {
    if (!(await tableExists(pgSql, migration.table))) {
      await pgSql.unsafe(migration.create);
      created.push(migration.table);
      logger.info("Created table", { table: migration.table });
    }

    for (const statement of migration.indexes) {
      await pgSql.unsafe(statement);
    }
  }

  logger.info("Migrations complete", { created: created.length });
  return created;
}
