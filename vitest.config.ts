import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["scripts/**/*.test.ts"],
    coverage: {
      reporter: ["text", "html"],
      include: ["scripts/leaderboard/**/*.ts"],
      exclude: ["scripts/leaderboard/test-utils/**", "scripts/leaderboard/index.ts"],
    },
  },
});
