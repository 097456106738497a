import { resolve } from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@circlet/core": resolve(__dirname, "packages/core/src/index.ts"),
      "@circlet/eval": resolve(__dirname, "packages/eval/src/index.ts"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
  },
});
