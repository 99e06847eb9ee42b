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
      { find: "@warden/shared", replacement: path.join(packagesDir, "shared/src") },
      { find: "@warden/logger", replacement: path.join(packagesDir, "logger/src") },
      { find: "@warden/orchestrator", replacement: path.join(packagesDir, "orchestrator/src") }
    ]
  }
});
