import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      "packages/*/src/**/*.test.ts",
      "apps/*/src/**/*.test.ts",
      "apps/*/tests/**/*.test.ts",
    ],
    environment: "node",
    testTimeout: 30000,
    hookTimeout: 30000,
    reporters: "default",
    env: {
      LOG_LEVEL: "error",
    },
  },
});
