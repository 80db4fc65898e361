import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "iterum",
    globals: true,
    environment: "node",
  },
});
