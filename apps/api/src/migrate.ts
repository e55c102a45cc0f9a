/**
 * Migration Script
 *
 * Creates the workflow tables without starting the server. Existing
 * tables are left alone; indexes are created if missing.
 *
 * Usage: npm run migrate -w @workgate/api
 */

import "./env.js";
import {
  closeDatabase,
  createLogger,
  initDatabase,
  loadConfig,
  runMigrations,
} from "@workgate/platform";

const logger = createLogger("migrate");

async function migrate(): Promise<void> {
  const config = loadConfig();
  if (!config.database.url) {
    throw new Error("DATABASE_URL is not set; there is nothing to migrate.");
  }

  logger.info("Starting database migration", {
    database: config.database.url.replace(/\/\/.*@/, "//***@"),
  });

  initDatabase(config.database.url);
  try {
    const created = await runMigrations();
    logger.info("Migration complete", { created });
  } finally {
    await closeDatabase();
  }
}

migrate().catch((err: unknown) => {
  logger.error("Migration failed", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
