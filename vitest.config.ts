import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    // Resolve workspace packages to their sources so vitest can follow their
    // deps. Exact matches, so the testing subpath is not read as a prefix.
    alias: [
      {
        find: /^@cadence\/shared\/testing$/,
        replacement: fileURLToPath(
          new URL("./packages/shared/src/testing.ts", import.meta.url),
        ),
      },
      {
        find: /^@cadence\/shared$/,
        replacement: fileURLToPath(
          new URL("./packages/shared/src/index.ts", import.meta.url),
        ),
      },
      {
        find: /^@cadence\/ingest$/,
        replacement: fileURLToPath(
          new URL("./packages/ingest/src/index.ts", import.meta.url),
        ),
      },
    ],
  },
  test: {
    include: ["packages/*/src/**/__tests__/**/*.test.ts"],
    server: {
      deps: {
        inline: [/^@cadence\//, "zod"],
      },
    },
  },
});
