import { defineConfig } from "vitest/config";
import path from "path";

const packagesDir = path.resolve(__dirname, "packages");

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/test/**/*.spec.ts"]
  },
  resolve: {
    alias: [
      { find: "@constant-synthesis/shared", replacement: path.join(packagesDir, "shared/src") },
      { find: "@constant-synthesis/logger", replacement: path.join(packagesDir, "logger/src") },
      { find: "@constant-synthesis/core", replacement: path.join(packagesDir, "core/src") }
    ]
  }
});
