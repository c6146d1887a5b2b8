import { describe, expect, it } from "vitest";

import { DEFAULT_CONVERSION_CONFIG, resolveConversionConfig } from "../src/conversion/config";

describe("resolveConversionConfig", () => {
  it("falls back to defaults", () => {
    expect(resolveConversionConfig({}, {})).toEqual(DEFAULT_CONVERSION_CONFIG);
    expect(DEFAULT_CONVERSION_CONFIG).toEqual({ maxRewrites: 10_000, verify: true, debug: false });
  });

  it("reads environment flags", () => {
    expect(
      resolveConversionConfig(
        {},
        { GPU_LEGALIZE_MAX_REWRITES: "25", GPU_LEGALIZE_VERIFY: "0", GPU_LEGALIZE_DEBUG: "1" },
      ),
    ).toEqual({ maxRewrites: 25, verify: false, debug: true });
  });

  it("treats empty flags as unset", () => {
    expect(
      resolveConversionConfig({}, { GPU_LEGALIZE_MAX_REWRITES: "", GPU_LEGALIZE_VERIFY: "", GPU_LEGALIZE_DEBUG: "" }),
    ).toEqual(DEFAULT_CONVERSION_CONFIG);
  });

  it("lets explicit overrides win over the environment", () => {
    const config = resolveConversionConfig(
      { maxRewrites: 3, debug: false },
      { GPU_LEGALIZE_MAX_REWRITES: "25", GPU_LEGALIZE_DEBUG: "1" },
    );
    expect(config).toEqual({ maxRewrites: 3, verify: true, debug: false });
  });

  it("rejects a malformed rewrite limit", () => {
    expect(() => resolveConversionConfig({}, { GPU_LEGALIZE_MAX_REWRITES: "lots" })).toThrow(
      'GPU_LEGALIZE_MAX_REWRITES must be a positive integer, got "lots"',
    );
    expect(() => resolveConversionConfig({}, { GPU_LEGALIZE_MAX_REWRITES: "0" })).toThrow(
      "GPU_LEGALIZE_MAX_REWRITES must be a positive integer",
    );
  });
});
