import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      "soldmis-server/src/__tests__/**/*.test.ts",
      "shared/*/src/__tests__/**/*.test.ts",
    ],
    exclude: ["node_modules/**", "dist/**"],
    environment: "node",
    globals: true,
    env: {
      LOG_LEVEL: "silent",
      OTEL_SDK_DISABLED: "true",
    },
  },
});
