import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["aggregator/src/**/*.test.ts"],
    environment: "node",
  },
});
