// vitest.config.ts (workspace root)
import { defineConfig } from "vitest/config";
import path from "node:path";

export default defineConfig({
  resolve: {
    alias: {
      "@shared": path.resolve(__dirname, "backend/services/shared"),
    },
  },
  test: {
    environment: "node",
    include: ["backend/services/*/test/**/*.spec.ts"],
    setupFiles: ["backend/services/endpoints/test/setup.ts"],
    reporters: ["default"],
  },
});
