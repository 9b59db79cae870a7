import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["server/src/**/*.test.ts", "client/src/**/*.test.ts", "shared/**/*.test.ts"],
    testTimeout: 10000,
  },
});
