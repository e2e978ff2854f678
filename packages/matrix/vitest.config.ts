import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@decimatrix/matrix",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
