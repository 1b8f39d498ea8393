import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    env: {
      OPENAI_API_KEY: "test-secret",
      NODE_ENV: "test",
      LOG_LEVEL: "error",
    },
  },
});
