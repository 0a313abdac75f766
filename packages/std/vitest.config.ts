import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@powser/std",
    globals: true,
    environment: "node",
  },
});
