import { defineConfig } from "vitest/config";
import path from "node:path";
import { fileURLToPath } from "node:url";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@": path.resolve(rootDir, "./src"),
    },
  },
  test: {
    environment: "node",
    setupFiles: ["./tests/setup.ts"],
    include: ["tests/unit/**/*.{test,spec}.ts", "src/**/*.{test,spec}.ts"],
    // Integration tests poll real files; keep them from competing for the disk.
    fileParallelism: false,
    testTimeout: 10000,
    coverage: {
      provider: "v8",
      all: false,
      reporter: ["text", "lcov"],
      exclude: [
        "src/**/*.test.ts",
        "src/test/**",
        "**/*.d.ts",
        "**/*.config.ts",
        "**/node_modules/**",
      ],
    },
  },
});
