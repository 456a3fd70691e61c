import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov", "html"],
      include: ["src/**/*.ts"],
      exclude: [
        "src/**/*.test.ts",
        "src/types/**", // Pure type definitions, no runtime code
        "src/cli/index.ts", // Process entry point
      ],
    },
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
