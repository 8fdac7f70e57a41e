import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["polyllm/tests/**/*.test.ts"],
    testTimeout: 10000,
  },
});
