import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    watch: false, // Run once and exit, don't wait for 'q'
    environment: "node",
    include: ["src/**/*.test.ts", "test/**/*.test.ts"],
    setupFiles: ["test/setup.ts"],
    benchmark: {
      include: ["bench/**/*.bench.ts"],
    },
  },
});
