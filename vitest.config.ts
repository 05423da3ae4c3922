import path from "node:path";
import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const thisDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@pcode/model": path.resolve(thisDir, "packages/pcode-model/src/index.ts"),
    },
  },
});
