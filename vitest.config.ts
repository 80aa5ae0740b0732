import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    environment: "node",
    clearMocks: true,
    restoreMocks: true,
  },
  resolve: {
    alias: {
      "@tradeloop/core": path.resolve(rootDir, "packages/core/src/index.ts"),
      "@tradeloop/jupiter": path.resolve(rootDir, "packages/jupiter/src/index.ts"),
      "@tradeloop/solana": path.resolve(rootDir, "packages/solana/src/index.ts"),
      "@tradeloop/store": path.resolve(rootDir, "packages/store/src/index.ts"),
    },
  },
});
