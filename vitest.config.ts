import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts", "apps/api/test/**/*.test.ts"],
    environment: "node",
    testTimeout: 10_000
  }
});
