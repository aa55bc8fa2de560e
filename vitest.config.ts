import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/server/**/*.test.ts", "packages/*/src/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent"
    }
  }
});
