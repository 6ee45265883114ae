import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const WORKSPACES = ["types", "catalog", "reconciler", "verify", "cli"];

export default defineConfig({
  resolve: {
    // Workspace packages export built files to Node; tests run the sources
    alias: WORKSPACES.map((name) => ({
      find: `@setcheck/${name}`,
      replacement: fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url)),
    })),
  },
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json"],
      include: ["packages/*/src/**/*.ts"],
      exclude: ["packages/*/src/index.ts", "packages/cli/src/main.ts"],
      thresholds: {
        statements: 90,
        branches: 80,
        functions: 90,
        lines: 90,
      },
    },
  },
});
