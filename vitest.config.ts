import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts", "api/tests/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
