import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["api/src/**/*.test.ts"],
    environment: "node",
    env: { LOG_LEVEL: "silent", STORE: "memory" },
  },
});
