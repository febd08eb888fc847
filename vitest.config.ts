import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    // zeromq addon and child process signalling
    pool: "forks",
    testTimeout: 20_000,
  },
});
