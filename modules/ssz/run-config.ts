import crypto from "node:crypto";
import { C, G, M_SUN, PHI } from "@shared/physics-const";
import {
  SszModelParameterFields,
  SszPhysicalConstants,
  SszRunConfig,
  SszXiMode,
  type TSszModelParameters,
  type TSszPhysicalConstants,
  type TSszRunConfig,
  type TSszRunConfigOverrides,
  type TSszXiMode,
} from "@shared/ssz";
import { SszInputError } from "./errors";

export const RUN_CONFIG_SCHEMA_VERSION = "ssz_run_config/1" as const;

export const DEFAULT_PHYSICAL_CONSTANTS: TSszPhysicalConstants = Object.freeze({
  G,
  c: C,
  M_sun: M_SUN,
  phi: PHI,
});

export const DEFAULT_MODEL_PARAMETERS: TSszModelParameters = Object.freeze({
  blendLow: 1.8,
  blendHigh: 2.2,
  photonSphereMax: 3.0,
  weakStart: 10.0,
  xiMax: 1.0,
  deltaMEnabled: true,
  deltaA: 98.01,
  deltaAlpha: 2.7177e4,
  deltaB: 1.96,
  logMassMin: 10,
  logMassMax: 42,
  powerLawAlpha: 0.3187,
  powerLawBeta: 0.9821,
});

export type RunConfigOverrides = TSszRunConfigOverrides;

const deepFreeze = <T extends object>(value: T): T => {
  for (const nested of Object.values(value)) {
    if (nested && typeof nested === "object" && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
};

const hashRunId = (xiMode: TSszXiMode, constants: TSszPhysicalConstants, params: TSszModelParameters) => {
  const digest = crypto
    .createHash("sha256")
    .update(JSON.stringify({ xiMode, constants, params }))
    .digest("hex");
  return `ssz_${digest.slice(0, 12)}`;
};

const definedEntries = (value: object) =>
  Object.fromEntries(Object.entries(value).filter(([, entry]) => entry !== undefined));

const formatIssuePath = (path: (string | number)[]) => (path.length ? path.join(".") : "config");

/**
 * Build the frozen configuration for one batch. Overrides are validated as a
 * whole; an invalid combination throws instead of falling back to defaults.
 */
export function createRunConfig(overrides: RunConfigOverrides = {}): TSszRunConfig {
  const partialParams = SszModelParameterFields.partial().safeParse(overrides.params ?? {});
  if (!partialParams.success) {
    const issue = partialParams.error.issues[0];
    throw new SszInputError(`invalid model parameter: ${issue.message}`, `params.${formatIssuePath(issue.path)}`);
  }
  const partialConstants = SszPhysicalConstants.partial().safeParse(overrides.constants ?? {});
  if (!partialConstants.success) {
    const issue = partialConstants.error.issues[0];
    throw new SszInputError(`invalid constant: ${issue.message}`, `constants.${formatIssuePath(issue.path)}`);
  }
  const xiMode = SszXiMode.safeParse(overrides.xiMode ?? "auto");
  if (!xiMode.success) {
    throw new SszInputError(`unknown xi mode: ${String(overrides.xiMode)}`, "xiMode");
  }

  const parsed = SszRunConfig.omit({ runId: true }).safeParse({
    schema_version: RUN_CONFIG_SCHEMA_VERSION,
    xiMode: xiMode.data,
    constants: { ...DEFAULT_PHYSICAL_CONSTANTS, ...definedEntries(partialConstants.data) },
    params: { ...DEFAULT_MODEL_PARAMETERS, ...definedEntries(partialParams.data) },
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new SszInputError(issue.message, formatIssuePath(issue.path));
  }
  const { constants, params } = parsed.data;
  return deepFreeze({ ...parsed.data, runId: hashRunId(xiMode.data, constants, params) });
}

export const DEFAULT_RUN_CONFIG: TSszRunConfig = createRunConfig();

export const describeRunConfig = (config: TSszRunConfig): string =>
  `Run: ${config.runId} | phi=${config.constants.phi.toFixed(6)} | xi=${config.xiMode} | ` +
  `blend=[${config.params.blendLow}, ${config.params.blendHigh}] | deltaM=${config.params.deltaMEnabled ? "on" : "off"}`;
