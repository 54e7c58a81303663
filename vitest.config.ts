import { defineConfig, coverageConfigDefaults } from "vitest/config";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";

const __dirname = dirname(fileURLToPath(import.meta.url));
const isCI = process.env.CI === "true";

export default defineConfig({
  resolve: {
    alias: {
      "@glucolog/diabetes": resolve(__dirname, "packages/diabetes/src/index.ts"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    exclude: ["node_modules/**", "dist/**"],

    coverage: {
      provider: "v8",
      reporter: isCI ? ["text", "json", "lcov"] : ["text", "html"],
      reportsDirectory: "./coverage",

      include: ["packages/diabetes/src/**/*.ts", "packages/functions/src/**/*.ts"],

      exclude: [
        ...coverageConfigDefaults.exclude,
        "**/*.test.ts",
        "**/*.d.ts",
        "**/models/**",
        "**/index.ts",
        "**/cli.ts",
      ],

      thresholds: {
        lines: 60,
        branches: 50,
        functions: 60,
        statements: 60,
      },
    },
  },
});
