import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "exchange",
    include: ["src/**/*.test.ts"],
    globals: true,
    coverage: {
      include: ["src/**/*.ts"],
      exclude: [
        "src/**/*.test.ts",
        "src/types/**",
        "src/test-helpers.ts",
        "src/daemon.ts",
        "src/index.ts",
      ],
    },
  },
});
