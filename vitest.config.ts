import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    environment: "node",
    // tree-sitter is a native addon; keep it out of worker threads
    pool: "forks",
    testTimeout: 20000,
  },
});
