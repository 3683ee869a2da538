import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

/** Workspace packages resolve to their sources, so tests need no build */
function source(pkg: string): string {
  return fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      "@wsload/errors": source("errors"),
      "@wsload/loadgen": source("loadgen"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    testTimeout: 10_000,
    hookTimeout: 10_000,
    reporters: process.env.CI ? ["default", "json"] : ["default"],
    outputFile: process.env.CI ? { json: "test-results.json" } : undefined,
    coverage: {
      provider: "v8",
      include: ["packages/*/src/**/*.ts"],
      exclude: ["packages/*/src/**/*.test.ts", "packages/*/src/**/__tests__/**"],
      reporter: ["text", "json", "clover"],
      reportsDirectory: "coverage",
    },
  },
});
