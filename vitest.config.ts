import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      // Root-level tests: end-to-end grammars built from the public API
      {
        extends: true,
        test: {
          name: "grammars",
          include: ["tests/**/*.test.ts"],
        },
      },
      // Package tests
      "packages/*/vitest.config.ts",
    ],

    exclude: ["**/node_modules/**", "**/dist/**"],

    pool: "forks",

    typecheck: {
      enabled: false,
    },

    testTimeout: 30000,
    hookTimeout: 15000,
  },
});
