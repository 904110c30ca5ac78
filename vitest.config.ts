import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/tests/**/*.test.ts"],
    environment: "node",
    env: {
      APP_ENV: "test",
      LOG_LEVEL: "error"
    },
    testTimeout: 15_000
  }
});
