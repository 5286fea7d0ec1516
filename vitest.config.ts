import path from "node:path";
import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/test/**/*.test.ts"],
    // clipanion's ESM build imports a directory, which Node's loader rejects.
    server: { deps: { inline: ["clipanion"] } },
    coverage: {
      reporter: ["text", "lcov"],
    },
  },
  resolve: {
    alias: {
      "@specsync/core": path.resolve(__dirname, "packages/specsync-core/src/index.ts"),
      "@specsync/capabilities": path.resolve(__dirname, "packages/specsync-capabilities/src/index.ts"),
    },
  },
});
