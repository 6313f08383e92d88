import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packagesDir = fileURLToPath(new URL("./packages", import.meta.url));

export default defineConfig({
  resolve: {
    // Workspace packages are loaded from source; dist/ only exists after a build
    alias: [
      {
        find: /^@settlekit\/([a-z-]+)$/,
        replacement: `${packagesDir}/$1/src/index.ts`,
      },
    ],
  },
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
    testTimeout: 30_000,
  },
});
