/**
 * Vitest Configuration — @workgate/api
 *
 * API tests using Fastify's inject() method against the in-memory store.
 * Exercises the full request/response cycle without a real HTTP server.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
