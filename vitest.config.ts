import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const pkg = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
    alias: {
      "@cursor-bin/logger": pkg("logger"),
      "@cursor-bin/core": pkg("core"),
      "@cursor-bin/recipe": pkg("recipe"),
      "@cursor-bin/artifact": pkg("artifact"),
      "@cursor-bin/updater": pkg("updater"),
      "@cursor-bin/validator": pkg("validator"),
    },
  },
});
