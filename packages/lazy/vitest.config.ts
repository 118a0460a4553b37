import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@exprfuse/lazy",
    globals: true,
    environment: "node",
  },
});
