/**
 * Application Configuration
 *
 * Loads configuration from environment variables with sensible defaults.
 * All config is validated at startup — fail fast if misconfigured.
 */

import type { TransitionPolicy } from "@workgate/contracts";

export interface AppConfig {
  env: "development" | "test" | "production";
  database: {
    /** Unset outside production means "use the in-memory store" */
    url: string | null;
  };
  api: {
    port: number;
    host: string;
    corsOrigin: string;
  };
  rateLimit: {
    max: number;
    windowMs: number;
  };
  workflow: {
    transitionPolicy: TransitionPolicy;
  };
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function readPolicy(env: Env): TransitionPolicy {
  const raw = env.WORKFLOW_TRANSITION_POLICY || "open";
  if (raw !== "open" && raw !== "closed") {
    throw new Error(`WORKFLOW_TRANSITION_POLICY must be "open" or "closed", got "${raw}"`);
  }
  return raw;
}

function readEnvName(env: Env): AppConfig["env"] {
  const raw = env.NODE_ENV ?? "development";
  return raw === "production" || raw === "test" ? raw : "development";
}

/**
 * Loads configuration from process.env (or the given map).
 * Throws immediately if a value is invalid or a production requirement is missing.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const name = readEnvName(env);
  const databaseUrl = env.DATABASE_URL || null;

  if (name === "production" && !databaseUrl) {
    throw new Error(
      "DATABASE_URL environment variable is required in production. See .env.example."
    );
  }

  return {
    env: name,
    database: {
      url: databaseUrl,
    },
    api: {
      port: readInt(env, "API_PORT", 4000),
      host: env.API_HOST || "0.0.0.0",
      corsOrigin: env.CORS_ORIGIN || "http://localhost:3000",
    },
    rateLimit: {
      max: readInt(env, "RATE_LIMIT_MAX", 200),
      windowMs: readInt(env, "RATE_LIMIT_WINDOW_MS", 60_000),
    },
    workflow: {
      transitionPolicy: readPolicy(env),
    },
  };
}
