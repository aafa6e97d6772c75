import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["strata/**/__tests__/**/*.test.ts", "logging/**/__tests__/**/*.test.ts"],
    env: {
      STRATA_LOG_LEVEL: "silent",
    },
  },
});
