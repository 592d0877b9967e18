import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    coverage: {
      reporter: ["text", "lcov"],
      include: ["src/**/*.ts"],
      exclude: ["src/game/types/**", "src/**/*.test.ts"],
      thresholds: {
        statements: 92,
        branches: 80,
        functions: 92,
        lines: 95
      }
    }
  }
});
