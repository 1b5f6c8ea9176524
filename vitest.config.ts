// /vitest.config.ts (workspace root)
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["backend/**/test/**/*.spec.ts"],
    env: {
      LOG_LEVEL: "silent",
    },
    hookTimeout: 30000,
    testTimeout: 30000,
    restoreMocks: true,
    watch: false,
    reporters: ["default"],
  },
});
