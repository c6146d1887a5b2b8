export type ConversionConfig = {
  /** Successful rewrites allowed before the driver gives up. */
  maxRewrites: number;
  /** Run the structural verifier after a successful conversion. */
  verify: boolean;
  /** Print driver decisions to the console. */
  debug: boolean;
};

export const DEFAULT_CONVERSION_CONFIG: ConversionConfig = {
  maxRewrites: 10_000,
  verify: true,
  debug: false,
};

type Env = Record<string, string | undefined>;

function processEnv(): Env {
  return typeof process !== "undefined" && process.env ? process.env : {};
}

function parsePositiveInt(raw: string | undefined, name: string): number | undefined {
  if (raw === undefined || raw === "") {
    return undefined;
  }
  const value = parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Explicit overrides win over environment flags, which win over defaults:
 * - GPU_LEGALIZE_MAX_REWRITES=<n>
 * - GPU_LEGALIZE_VERIFY=0 disables the post-conversion verifier
 * - GPU_LEGALIZE_DEBUG=1 logs driver decisions
 */
export function resolveConversionConfig(
  overrides: Partial<ConversionConfig> = {},
  env: Env = processEnv(),
): ConversionConfig {
  const fromEnv: Partial<ConversionConfig> = {};
  const maxRewrites = parsePositiveInt(env.GPU_LEGALIZE_MAX_REWRITES, "GPU_LEGALIZE_MAX_REWRITES");
  if (maxRewrites !== undefined) {
    fromEnv.maxRewrites = maxRewrites;
  }
  if (env.GPU_LEGALIZE_VERIFY !== undefined) {
    fromEnv.verify = env.GPU_LEGALIZE_VERIFY !== "0";
  }
  if (env.GPU_LEGALIZE_DEBUG !== undefined) {
    fromEnv.debug = env.GPU_LEGALIZE_DEBUG !== "0" && env.GPU_LEGALIZE_DEBUG !== "";
  }
  return { ...DEFAULT_CONVERSION_CONFIG, ...fromEnv, ...stripUndefined(overrides) };
}

function stripUndefined(overrides: Partial<ConversionConfig>): Partial<ConversionConfig> {
  const out: Partial<ConversionConfig> = {};
  if (overrides.maxRewrites !== undefined) out.maxRewrites = overrides.maxRewrites;
  if (overrides.verify !== undefined) out.verify = overrides.verify;
  if (overrides.debug !== undefined) out.debug = overrides.debug;
  return out;
}
