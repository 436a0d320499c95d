import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "cli",
    environment: "node",
    include: ["tests/**/*.test.ts"],
    // index.ts parses argv on import and is exercised by hand.
    coverage: {
      include: ["src/api.ts", "src/config.ts"],
      thresholds: {
        branches: 80,
        lines: 80,
      },
    },
  },
});
