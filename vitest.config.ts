import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    testTimeout: 20000,
    // Suites open native DuckDB instances; run files one at a time
    fileParallelism: false,
  },
});
