/**
 * Seed Script
 *
 * Loads the demo tenants, users, workflows and work items into PostgreSQL.
 * Safe to run more than once: existing rows are kept.
 *
 * Usage: npm run seed -w @workgate/api
 */

import "./env.js";
import {
  closeDatabase,
  coreActions,
  createLogger,
  initDatabase,
  initWorkflowCore,
  loadConfig,
  PostgresIdentityProvider,
  PostgresWorkflowStore,
  registerActions,
  runMigrations,
} from "@workgate/platform";
import { provisionPostgresIdentity, seedDemoWorkflows } from "./demo.js";

const logger = createLogger("seed");

async function seed(): Promise<void> {
  const config = loadConfig();
  if (!config.database.url) {
    throw new Error("DATABASE_URL is not set; the in-memory store seeds itself on startup.");
  }

  const { db } = initDatabase(config.database.url);
  try {
    await runMigrations();
    await provisionPostgresIdentity(db);

    initWorkflowCore({
      store: new PostgresWorkflowStore(db),
      identity: new PostgresIdentityProvider(db),
      policy: config.workflow.transitionPolicy,
    });
    registerActions(coreActions);

    const created = await seedDemoWorkflows();
    logger.info("Seed complete", { items: created });
  } finally {
    await closeDatabase();
  }
}

seed().catch((err: unknown) => {
  logger.error("Seed failed", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
