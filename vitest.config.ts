import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: {
      LOGGING_LEVEL: "silent",
      LOG_TO_FILE: "false",
    },
    testTimeout: 10000,
    reporters: ["default"],
  },
});
