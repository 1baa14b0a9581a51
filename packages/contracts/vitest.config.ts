/**
 * Vitest Configuration — @navdock/contracts
 *
 * Pure TypeScript tests. No DOM, no database, no network.
 * These tests validate the navigation Zod schemas.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
