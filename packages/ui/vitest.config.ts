/**
 * Vitest Configuration — @navdock/ui
 *
 * Component, server-rendering, and keyboard tests.
 * Uses jsdom to simulate the browser environment.
 *
 * The React plugin provides automatic JSX transformation so test files
 * don't need to manually import React.
 */

import { defineConfig } from "vitest/config";
import react from "@vitejs/plugin-react";

export default defineConfig({
  plugins: [react()],
  test: {
    globals: true,
    environment: "jsdom",
    include: ["src/**/*.test.ts", "src/**/*.test.tsx"],
    setupFiles: ["./src/test-setup.ts"],
  },
});
