import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Tests import describe/it/expect explicitly, but keep the globals
    // available for helpers shared between files.
    globals: true,
    // Everything here runs on Node: real files in temp folders, worker_threads.
    environment: "node",
    include: ["src/**/*.test.ts", "test/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 70,
        statements: 80,
      },
      include: ["src/**/*.ts"],
      exclude: ["src/models/**", "src/index.ts", "src/codec/codec-worker.ts", "**/*.test.ts"],
    },
  },
});
