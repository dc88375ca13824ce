import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    include: ["packages/**/src/**/*.test.ts"],
    environment: "node",
    testTimeout: 15000,
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
