import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: {
      PITY_ENGINE_LOG_LEVEL: "silent",
    },
  },
});
