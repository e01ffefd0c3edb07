import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts", "apps/*/tests/**/*.test.ts"],
    testTimeout: 30000,
    coverage: {
      reporter: ["text", "lcov"],
    },
  },
  resolve: {
    alias: {
      "@binpatch/utils": fileURLToPath(new URL("./packages/utils/src/index.ts", import.meta.url)),
      "@binpatch/patch": fileURLToPath(new URL("./packages/patch/src/index.ts", import.meta.url)),
    },
  },
});
