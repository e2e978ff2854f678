import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@decimatrix/core",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
