import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@iterum/iter",
    globals: true,
    environment: "node",
  },
});
