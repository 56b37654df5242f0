import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@cf-deploy/shared-types": fileURLToPath(
        new URL("./packages/shared-types/src/index.ts", import.meta.url)
      )
    }
  },
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    environment: "node"
  }
});
