import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/tests/**/*.test.ts"],
    environment: "node",
    // libSQL loads a native binding; keep each file in its own process
    pool: "forks",
  },
});
