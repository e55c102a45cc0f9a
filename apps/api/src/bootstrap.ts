/**
 * Bootstrap
 *
 * Wires the platform with the domain layer. This is the SINGLE place
 * where platform meets domain.
 *
 * Sequence:
 *   1. Observability (captures errors from every later step)
 *   2. Configuration + auth provider
 *   3. Storage: PostgreSQL when DATABASE_URL is set, in-memory otherwise
 *   4. Workflow core (resolver, engine, aggregator, audit)
 *   5. Actions + event subscribers
 *   6. Demo data, for the in-memory backend only
 */

import {
  coreActions,
  createLogger,
  initAuthProvider,
  initDatabase,
  initObservability,
  initWorkflowCore,
  loadConfig,
  MemoryIdentityProvider,
  MemoryWorkflowStore,
  PostgresIdentityProvider,
  PostgresWorkflowStore,
  registerActions,
  runMigrations,
  subscribeAll,
  type AppConfig,
  type WorkflowCore,
} from "@workgate/platform";
import { createEventSubscribers } from "@workgate/domain";
import { provisionMemoryIdentity, seedDemoWorkflows } from "./demo.js";

export interface BootstrapResult {
  config: AppConfig;
  core: WorkflowCore;
  storage: "postgres" | "memory";
}

const logger = createLogger("bootstrap");

/**
 * Initializes the entire application.
 * Call once at server startup (or once per test file).
 */
export async function bootstrap(
  config: AppConfig = loadConfig(),
  env: Record<string, string | undefined> = process.env
): Promise<BootstrapResult> {
  initObservability(env);
  initAuthProvider(env);

  let core: WorkflowCore;
  let storage: BootstrapResult["storage"];

  if (config.database.url) {
    const { db } = initDatabase(config.database.url);
    await runMigrations();
    core = initWorkflowCore({
      store: new PostgresWorkflowStore(db),
      identity: new PostgresIdentityProvider(db),
      policy: config.workflow.transitionPolicy,
    });
    storage = "postgres";
  } else {
    const identity = new MemoryIdentityProvider();
    provisionMemoryIdentity(identity);
    core = initWorkflowCore({
      store: new MemoryWorkflowStore(),
      identity,
      policy: config.workflow.transitionPolicy,
    });
    storage = "memory";
  }

  registerActions(coreActions);
  subscribeAll(createEventSubscribers(createLogger("subscribers")));

  if (storage === "memory") {
    const created = await seedDemoWorkflows();
    logger.info("In-memory store seeded with demo data", { items: created });
  }

  logger.info("Platform ready", {
    storage,
    policy: config.workflow.transitionPolicy,
    actions: coreActions.length,
  });

  return { config, core, storage };
}
