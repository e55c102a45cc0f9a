/**
 * HTTP Server
 *
 * Builds the Fastify instance: security headers, rate limiting, CORS,
 * health check and the REST routes over the Action Bus. Listening is
 * left to the caller so tests can use inject().
 */

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import { registerRESTRoutes, type AppConfig } from "@workgate/platform";

/** Public routes get a much higher ceiling than the rest of the API */
const PUBLIC_PATHS = new Set(["/api/health", "/api/meta/actions", "/api/auth/config"]);
const PUBLIC_RATE_LIMIT = 10_000;

export async function buildServer(config: AppConfig): Promise<FastifyInstance> {
  const isProd = config.env === "production";

  const app = Fastify({
    logger: false, // structured logging goes through createLogger
    // Behind a reverse proxy the rate limiter needs the real client IP
    trustProxy: isProd,
  });

  await app.register(helmet, {
    // CSP off in development
    contentSecurityPolicy: isProd,
  });

  await app.register(rateLimit, {
    max: (request) =>
      PUBLIC_PATHS.has(request.url.split("?")[0] ?? request.url)
        ? PUBLIC_RATE_LIMIT
        : config.rateLimit.max,
    timeWindow: config.rateLimit.windowMs,
  });

  const origin = config.api.corsOrigin;
  await app.register(cors, {
    origin: origin === "*" ? true : origin.split(",").map((o) => o.trim()),
    credentials: true,
    methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
  });

  app.get("/api/health", async () => ({
    status: "ok",
    timestamp: new Date().toISOString(),
  }));

  await registerRESTRoutes(app);

  return app;
}
