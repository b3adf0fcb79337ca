import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts", "apps/*/test/**/*.test.ts"],
    environment: "node",
    env: {
      LOG_LEVEL: "silent",
    },
    testTimeout: 10_000,
  },
});
