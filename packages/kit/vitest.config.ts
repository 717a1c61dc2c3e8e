import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "kit",
    include: ["src/**/*.test.ts"],
    globals: true,
    coverage: {
      include: ["src/**/*.ts"],
      exclude: [
        "src/**/*.test.ts",
        "src/**/index.ts",
      ],
    },
  },
});
