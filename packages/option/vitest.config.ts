import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@iterum/option",
    globals: true,
    environment: "node",
  },
});
