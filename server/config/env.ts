// Centralized environment switches for the SSZ engine
import { SszXiMode, type TSszModelParameters, type TSszRunConfig } from "@shared/ssz";
import { createRunConfig, DEFAULT_MODEL_PARAMETERS } from "../../modules/ssz/run-config";
import { SszInputError } from "../../modules/ssz/errors";

type Env = Record<string, string | undefined>;

const flagEnabled = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return defaultValue;
};

const numberOr = (value: string | undefined, defaultValue: number): number => {
  if (value === undefined || value.trim() === "") return defaultValue;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : defaultValue;
};

export const SSZ_GOLDEN_PATH_ENV = "SSZ_GOLDEN_PATH";

/**
 * Run configuration from SSZ_* variables. Unparseable values and boundary
 * overrides that break the regime ordering fall back to the defaults.
 */
export function resolveRunConfigFromEnv(env: Env = process.env): TSszRunConfig {
  const mode = SszXiMode.safeParse(env.SSZ_XI_MODE?.trim().toLowerCase());
  const params: Partial<TSszModelParameters> = {
    blendLow: numberOr(env.SSZ_BLEND_LOW, DEFAULT_MODEL_PARAMETERS.blendLow),
    blendHigh: numberOr(env.SSZ_BLEND_HIGH, DEFAULT_MODEL_PARAMETERS.blendHigh),
    weakStart: numberOr(env.SSZ_WEAK_START, DEFAULT_MODEL_PARAMETERS.weakStart),
    deltaMEnabled: flagEnabled(env.SSZ_DELTA_M_ENABLED, DEFAULT_MODEL_PARAMETERS.deltaMEnabled),
  };
  const xiMode = mode.success ? mode.data : "auto";
  try {
    return createRunConfig({ xiMode, params });
  } catch (err) {
    if (!(err instanceof SszInputError)) throw err;
    console.warn(`[ssz-config] ignoring boundary overrides: ${err.message}`);
    return createRunConfig({ xiMode, params: { deltaMEnabled: params.deltaMEnabled } });
  }
}

export const resolveGoldenPath = (env: Env = process.env): string | undefined => {
  const value = env[SSZ_GOLDEN_PATH_ENV]?.trim();
  return value ? value : undefined;
};
