import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Package tests
    projects: ["packages/*/vitest.config.ts"],

    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
