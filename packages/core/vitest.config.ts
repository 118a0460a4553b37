import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@exprfuse/core",
    globals: true,
    environment: "node",
  },
});
