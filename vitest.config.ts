import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    // git-backed tests spawn real processes
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
});
