import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/unit/**/*.test.ts"],
    testTimeout: 15_000,
    hookTimeout: 10_000,
    env: { MATCHLINK_LOG_LEVEL: "silent" },
  },
});
