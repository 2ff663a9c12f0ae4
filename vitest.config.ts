import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      "relative-date/src/**/__tests__/**/*.test.ts",
      "shared/**/__tests__/**/*.test.ts",
    ],
    exclude: ["node_modules/**", "dist/**"],
    environment: "node",
    globals: true,
  },
});
