import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: [
      "packages/*/src/**/*.test.ts",
      "services/*/src/**/*.test.ts",
      "test/contract/**/*.test.ts",
      "test/integration/**/*.test.ts",
    ],
    exclude: ["**/node_modules/**", "dist/**"],
    coverage: {
      provider: "v8",
      reporter: ["text", "html"],
      include: ["packages/*/src/**/*.ts", "services/*/src/**/*.ts"],
      // Barrel files and the process entry point (binds a port, installs signal handlers)
      exclude: ["**/*.test.ts", "packages/*/src/index.ts", "services/*/src/index.ts"],
    },
    testTimeout: 10_000,
  },
});
