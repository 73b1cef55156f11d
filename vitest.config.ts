import { defineConfig } from "vitest/config";

/**
 * Runs every workspace's own vitest.config.ts in one pass.
 */
export default defineConfig({
  test: {
    projects: ["packages/*", "examples/*"],
  },
});
