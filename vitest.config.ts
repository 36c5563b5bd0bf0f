import { defineConfig } from "vitest/config";
import path from "path";

export default defineConfig({
  test: {
    globals: true, // Use global APIs like describe, it, expect
    environment: "node",
    include: [
      "**/__tests__/**/*.{test,spec}.ts",
      "src/**/*.{test,spec}.ts"
    ],
    env: {
      LOG_TO_FILE: "false", // Keep test runs from writing logs/app.log
    },
    alias: {
      "@": path.resolve(__dirname, "./src"), // Match tsconfig paths
    },
  },
});
