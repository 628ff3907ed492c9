import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@weft/core",
    globals: true,
    environment: "node",
    // config tests change the working directory
    pool: "forks",
  },
});
