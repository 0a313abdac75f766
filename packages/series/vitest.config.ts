import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@powser/series",
    globals: true,
    environment: "node",
  },
});
