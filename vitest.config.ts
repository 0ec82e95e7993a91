import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    // proof-of-work search runs inside several tests
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
});
