import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@finscope/shared": fileURLToPath(new URL("./packages/shared/src/index.ts", import.meta.url))
    }
  },
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test"
    },
    testTimeout: 15_000
  }
});
