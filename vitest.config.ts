import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["services/**/tests/**/*.test.ts", "packages/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
      AUTH_SECRET: "test-secret-for-vitest-only",
      EXPOSE_DEV_TOOLS: "true",
    },
  },
});
