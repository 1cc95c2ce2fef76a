import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@weft/parser",
    environment: "node",
  },
});
