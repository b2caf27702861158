import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    // Workspace packages resolve to their TypeScript sources; no build step before tests.
    alias: {
      "@text-span/core": fileURLToPath(new URL("./packages/core/src/index.ts", import.meta.url)),
      "@text-span/diagnostics": fileURLToPath(new URL("./packages/diagnostics/src/index.ts", import.meta.url)),
    },
  },
});
