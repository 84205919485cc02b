import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    globals: false,
    include: ["src/**/*.test.ts"],
    env: {
      // keep the pino diagnostics quiet and off the pino-pretty worker
      LOG_LEVEL: "silent",
      LOG_PRETTY: "false"
    },
    restoreMocks: true,
    testTimeout: 10_000
  }
});
