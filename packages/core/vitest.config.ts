import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@iterum/core",
    globals: true,
    environment: "node",
  },
});
