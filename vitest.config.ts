import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packageSource = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@checkpoint-guide/types": packageSource("types"),
      "@checkpoint-guide/navigation": packageSource("navigation"),
      "@checkpoint-guide/catalog": packageSource("catalog"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
  },
});
