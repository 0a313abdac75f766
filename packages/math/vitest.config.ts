import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@powser/math",
    globals: true,
    environment: "node",
  },
});
