import { defineConfig } from "vitest/config";

// Benchmarks join the run only when asked for: VITEST_PERF=1 npm test
const benchmarks = process.env.VITEST_PERF ? ["packages/*/benchmarks/**/*.bench.ts"] : [];

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: [
      "packages/*/src/**/*.test.ts",
      "packages/*/test/**/*.test.ts",
      ...benchmarks,
    ],
    exclude: ["**/node_modules/**", "**/dist/**"],
    restoreMocks: true,
    unstubGlobals: true,
    unstubEnvs: true,
  },
});
