import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    // Worker threads: pino only hooks process "exit" on the main thread, which
    // would otherwise leak into tests that spy on process.on.
    pool: "threads",
  },
});
