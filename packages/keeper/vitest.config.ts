import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "keeper",
    include: ["tests/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json"],
      include: ["src/**/*.ts"],
      exclude: ["src/index.ts"],
    },
  },
});
