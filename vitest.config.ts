import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["reporting/tests/**/*.test.ts"],
    setupFiles: ["reporting/tests/setup-env.ts"],
  },
});
