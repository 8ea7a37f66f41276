import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    globals: true,
    testTimeout: 30000, // 30s timeout for crypto init
    include: ["tests/**/*.test.ts"],
  },
});
