import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["test/**/*.test.ts"],
    // Clear logging overrides so tests run with the silent default.
    env: {
      TALLYBOOK_LOG_LEVEL: "",
      TALLYBOOK_LOG_PRETTY: "",
      TALLYBOOK_DEBUG: "",
    },
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      reporter: ["text", "text-summary", "lcov"],
    },
    // Isolate tests to avoid module state leaks
    pool: "forks",
    testTimeout: 10000,
  },
});
