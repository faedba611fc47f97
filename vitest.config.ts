import path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@brightree-bridge/record-schema": path.resolve(__dirname, "packages/record-schema/src/index.ts"),
      "@brightree-bridge/portal-client": path.resolve(__dirname, "packages/portal-client/src/index.ts")
    }
  },
  test: {
    environment: "node",
    include: ["packages/**/tests/**/*.test.ts"]
  }
});
