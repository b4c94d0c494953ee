import { dirname, resolve } from "path";
import { fileURLToPath } from "url";
import tsconfigPaths from "vite-tsconfig-paths";
import { defineConfig } from "vitest/config";

const root = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  plugins: [
    tsconfigPaths({
      root: ".",
      projects: ["./tsconfig.json"],
      ignoreConfigErrors: true
    })
  ],
  resolve: {
    alias: {
      // src
      $shared: resolve(root, "./src/shared"),
      // lib
      $lib: resolve(root, "./src/lib"),
      $config: resolve(root, "./src/lib/config"),
      $export: resolve(root, "./src/lib/export"),
      $notion: resolve(root, "./src/lib/notion"),
      $util: resolve(root, "./src/lib/util"),
      // test
      $test: resolve(root, "./src/test")
    }
  },
  test: {
    include: ["./src/**/*.test.ts"],
    environment: "node",
    passWithNoTests: false,
    isolate: true,
    hideSkippedTests: true,
    name: "notion-md-export"
  }
});
