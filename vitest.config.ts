import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  resolve: {
    alias: {
      "@stagecraft/core": fileURLToPath(new URL("./packages/core/src/index.ts", import.meta.url)),
      "@stagecraft/pipeline": fileURLToPath(
        new URL("./packages/pipeline/src/index.ts", import.meta.url)
      ),
    },
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
  },
});
