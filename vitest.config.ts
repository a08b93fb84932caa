import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
    // process.chdir is unavailable in worker threads
    pool: "forks",
  },
});
