/**
 * Vitest Configuration — @navdock/platform
 *
 * Unit tests for the navigation engine.
 * No DOM, no network: the renderer is stubbed where a hook needs one.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
