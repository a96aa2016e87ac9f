import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["server/tests/**/*.test.ts"],
    globals: false,
    testTimeout: 20000,
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
