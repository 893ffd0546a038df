import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    // Workspace packages load from their sources, no build needed
    alias: {
      "@patchsync/file-sync": fileURLToPath(
        new URL("./packages/file-sync/src/index.ts", import.meta.url)
      ),
    },
  },
  test: {
    watch: false,
    include: ["packages/*/src/**/__tests__/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
