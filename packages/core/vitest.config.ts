import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@weft/core",
    environment: "node",
  },
});
