import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
    env: {
      OTEL_SDK_DISABLED: "true",
      LOG_LEVEL: "error",
    },
  },
});
