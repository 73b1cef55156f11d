import { defineConfig } from "vitest/config";

/**
 * Unit tests and Gherkin step files for the example machine.
 */
export default defineConfig({
  test: {
    name: "@hookfsm/example-powerup-hero",
    environment: "node",
    include: [
      "tests/unit/**/*.test.ts",
      "tests/steps/**/*.steps.ts", // Gherkin step files
    ],
    testTimeout: 30000,
    hookTimeout: 15000,
  },
});
