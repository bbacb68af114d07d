import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    env: {
      ROBOT_DIFF_LOG_CONSOLE: "false",
    },
  },
});
