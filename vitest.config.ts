import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["daemon/tests/**/*.test.ts"],
    testTimeout: 15000,
  },
});
