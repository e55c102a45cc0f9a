/**
 * Workgate API Server
 *
 * Fastify entry point. Boots the platform, builds the server, starts listening.
 */

import "./env.js";
import {
  captureException,
  closeDatabase,
  createLogger,
  flushObservability,
} from "@workgate/platform";
import { bootstrap } from "./bootstrap.js";
import { buildServer } from "./server.js";

const logger = createLogger("server");

async function main(): Promise<void> {
  const { config, storage } = await bootstrap();
  const app = await buildServer(config);

  await app.listen({ port: config.api.port, host: config.api.host });
  logger.info("Workgate API listening", {
    url: `http://localhost:${config.api.port}`,
    storage,
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info("Shutting down", { signal });
    await app.close();
    await flushObservability(2000);
    await closeDatabase();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error("Shutdown failed", { error: String(err) });
        process.exit(1);
      });
    });
  }
}

main().catch(async (err: unknown) => {
  logger.error("Fatal error", { error: err instanceof Error ? err.message : String(err) });
  captureException(err instanceof Error ? err : new Error(String(err)));
  await flushObservability(2000);
  process.exit(1);
});
