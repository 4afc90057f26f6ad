import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/__tests__/**/*.test.ts", "backend/src/**/__tests__/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
      GEMINI_API_KEY: "test-key",
      DATABASE_PATH: ":memory:",
    },
  },
});
