import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    coverage: {
      provider: "istanbul",
      reporter: ["text", "text-summary", "lcov"],
      include: ["src/**/*.ts"],
    },
    include: ["test/**/*.spec.ts"],
    // GPU_LEGALIZE_* flags in the shell must not change test expectations.
    env: {
      GPU_LEGALIZE_MAX_REWRITES: "",
      GPU_LEGALIZE_VERIFY: "",
      GPU_LEGALIZE_DEBUG: "",
    },
  },
});
