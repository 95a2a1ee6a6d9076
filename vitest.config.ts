import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts"],
    testTimeout: 10_000,
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      // Boundary coverage: the pipeline stages and the store
      include: [
        "src/planner/builder.ts",
        "src/rules/composer.ts",
        "src/rules/protection.ts",
        "src/optimizer/optimizer.ts",
        "src/costing/evaluator.ts",
        "src/config/scenario-store.ts",
        "src/service/planning-service.ts",
      ],
      exclude: [
        "src/**/__tests__/**",
        "src/schemas/**",
      ],
    },
  },
});
