import path from "node:path";
import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const dirname = path.dirname(fileURLToPath(import.meta.url));

const resolveFromRoot = (...segments: string[]) =>
  path.resolve(dirname, ...segments);

export default defineConfig({
  resolve: {
    alias: {
      "@inexact/core": resolveFromRoot("packages/core/src/index.ts"),
      "@inexact/utils": resolveFromRoot("packages/utils/src/index.ts"),
      "@inexact/decoder": resolveFromRoot("packages/decoder/src/index.ts"),
      "@inexact/classifier": resolveFromRoot("packages/classifier/src/index.ts"),
      "@inexact/sweep": resolveFromRoot("packages/sweep/src/index.ts"),
      "@inexact/synth": resolveFromRoot("packages/synth/src/index.ts"),
    },
  },
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
  },
});
