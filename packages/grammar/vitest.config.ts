import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@weft/grammar",
    globals: true,
    environment: "node",
  },
});
