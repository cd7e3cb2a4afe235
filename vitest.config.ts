/// <reference types="vitest" />
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    pool: "forks",
    poolOptions: {
      forks: {
        isolate: true, // Ensure test isolation
        singleFork: false,
      },
    },
    include: ["tests/**/*.{test,spec}.ts"],
    exclude: ["**/node_modules/**", "**/dist/**", "**/.git/**"],
    setupFiles: ["tests/suppress-console.ts"],
    testTimeout: 10000, // mailparser runs for real in the materializer tests
    hookTimeout: 30000,
    teardownTimeout: 10000,
    watch: false,
    clearMocks: true,
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html", "lcov"],
      reportsDirectory: "./coverage",
      include: ["src/**/*.ts"],
      exclude: [
        "**/node_modules/**",
        "**/dist/**",
        "**/*.d.ts",
        "**/types/**/*.ts",
        "src/main.ts",
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },
  },
});
