import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    testTimeout: 15000,
    env: {
      FLEET_UPDATER_LOG_LEVEL: "silent"
    }
  }
});
