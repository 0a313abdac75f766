import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@powser/core",
    globals: true,
    environment: "node",
  },
});
