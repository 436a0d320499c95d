import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "pipeline",
    environment: "node",
    include: ["tests/**/*.test.ts"],
    env: { LOG_LEVEL: "silent" },
    // Each file boots its own in-process Postgres (PGlite).
    testTimeout: 30_000,
    hookTimeout: 60_000,
    coverage: {
      thresholds: {
        branches: 70,
        functions: 70,
        lines: 70,
        statements: 70,
      },
    },
  },
});
