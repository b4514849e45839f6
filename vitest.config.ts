import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["apps/api/src/**/*.test.ts"],
    setupFiles: ["apps/api/src/__tests__/setup.ts"],
    testTimeout: 30_000
  }
});
