import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      "packages/**/*.test.ts",
      "services/*/src/__tests__/**/*.test.ts"
    ],
    environment: "node"
  }
});
