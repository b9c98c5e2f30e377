import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    exclude: ["test/fixtures/**"],
    environment: "node",
    restoreMocks: true,
    testTimeout: 15_000,
  },
});
