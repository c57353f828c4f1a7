import { z } from "zod";

export const SszRegime = z.enum(["very_close", "blended", "photon_sphere", "strong", "weak"]);
export type TSszRegime = z.infer<typeof SszRegime>;

export const SszXiMode = z.enum(["auto", "weak", "strong"]);
export type TSszXiMode = z.infer<typeof SszXiMode>;

// surface: fixed-radius emitter (Δ(M) mode); orbit: orbiting source (geometric hint).
export const SszSourceKind = z.enum(["surface", "orbit"]);
export type TSszSourceKind = z.infer<typeof SszSourceKind>;

export const SszRedshiftMethod = z.enum(["delta_m", "geometric_hint", "gr_weak_field"]);
export type TSszRedshiftMethod = z.infer<typeof SszRedshiftMethod>;

export const SszWinner = z.enum(["SSZ", "GR", "TIE"]);
export type TSszWinner = z.infer<typeof SszWinner>;

const positive = z.number().finite().positive();

export const SszPhysicalConstants = z.object({
  G: positive,
  c: positive,
  M_sun: positive,
  phi: positive,
});
export type TSszPhysicalConstants = z.infer<typeof SszPhysicalConstants>;

export const SszModelParameterFields = z.object({
  blendLow: positive,
  blendHigh: positive,
  photonSphereMax: positive,
  weakStart: positive,
  xiMax: positive,
  deltaMEnabled: z.boolean(),
  deltaA: z.number().finite().nonnegative(),
  deltaAlpha: z.number().finite().nonnegative(),
  deltaB: z.number().finite().nonnegative(),
  logMassMin: z.number().finite(),
  logMassMax: z.number().finite(),
  powerLawAlpha: z.number().finite().nonnegative(),
  powerLawBeta: positive,
});

export const SszModelParameters = SszModelParameterFields.superRefine((params, ctx) => {
  const ordered =
    params.blendLow < params.blendHigh &&
    params.blendHigh < params.photonSphereMax &&
    params.photonSphereMax < params.weakStart;
  if (!ordered) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "regime boundaries must satisfy blendLow < blendHigh < photonSphereMax < weakStart",
      path: ["blendLow"],
    });
  }
  if (params.logMassMax < params.logMassMin) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "logMassMax must not be below logMassMin",
      path: ["logMassMax"],
    });
  }
});
export type TSszModelParameters = z.infer<typeof SszModelParameters>;

export const SszRunConfig = z.object({
  schema_version: z.literal("ssz_run_config/1"),
  runId: z.string().min(1),
  xiMode: SszXiMode,
  constants: SszPhysicalConstants,
  params: SszModelParameters,
});
export type TSszRunConfig = z.infer<typeof SszRunConfig>;

export const SszRunConfigOverrides = z
  .object({
    xiMode: SszXiMode.optional(),
    constants: SszPhysicalConstants.partial().optional(),
    params: SszModelParameterFields.partial().optional(),
  })
  .strict();
export type TSszRunConfigOverrides = z.infer<typeof SszRunConfigOverrides>;

// NaN and null collapse to "absent" at the input boundary.
const absentIfNaN = (value: unknown) =>
  value === null || (typeof value === "number" && Number.isNaN(value)) ? undefined : value;

export const SszCelestialObject = z.object({
  name: z.string().trim().min(1, "name must be a non-empty string"),
  mass_Msun: z.number().finite().positive(),
  radius_m: z.number().finite().positive(),
  velocity_mps: z
    .preprocess(absentIfNaN, z.number().finite().optional())
    .transform((value) => value ?? 0),
  velocity_los_mps: z
    .preprocess(absentIfNaN, z.number().finite().optional())
    .transform((value) => value ?? 0),
  z_obs: z
    .preprocess(absentIfNaN, z.number().finite().optional())
    .transform((value) => value ?? null),
  source: SszSourceKind.default("surface"),
});
export type TSszCelestialObject = z.infer<typeof SszCelestialObject>;
export type TSszCelestialObjectInput = z.input<typeof SszCelestialObject>;

export type SszObservation = {
  z_obs: number;
  residual_ssz: number;
  residual_grsr: number;
  winner: TSszWinner;
};

export type SszCalculationResult = {
  name: string;
  mass_Msun: number;
  radius_m: number;
  velocity_mps: number;
  source: TSszSourceKind;
  r_s_m: number;
  r_over_rs: number;
  regime: TSszRegime;
  xi: number;
  D_ssz: number;
  D_gr: number;
  D_delta: number;
  /** NaN at or inside r_s, where D_GR is zero. */
  D_delta_pct: number;
  z_gr: number;
  z_sr: number;
  z_grsr: number;
  z_ssz_grav: number;
  z_ssz_total: number;
  delta_m_pct: number;
  method: TSszRedshiftMethod;
  compactness: number;
  E_norm: number;
  E_excess_pct: number;
  r_star_m: number;
  D_at_intersection: number;
  run_id: string;
  /** z_GR is not finite: the source sits at or inside r_s and carries no comparison. */
  degenerate: boolean;
  observation: SszObservation | null;
};

export const SszValidationCategory = z.enum([
  "core_formula",
  "physical_limits",
  "numerical_precision",
  "regime_continuity",
  "experimental",
  "golden_regression",
]);
export type TSszValidationCategory = z.infer<typeof SszValidationCategory>;

export const SszValidationStatus = z.enum(["pass", "fail"]);
export type TSszValidationStatus = z.infer<typeof SszValidationStatus>;

const reportValue = z.union([z.number().finite(), z.string()]);

export const SszValidationOutcome = z.object({
  id: z.string().min(1),
  category: SszValidationCategory,
  label: z.string().min(1),
  status: SszValidationStatus,
  expected: reportValue,
  computed: reportValue,
  tolerance: z.number().finite().nonnegative(),
  diagnosis: z.string(),
});
export type TSszValidationOutcome = z.infer<typeof SszValidationOutcome>;

export const SszCategorySummary = z.object({
  total: z.number().int().nonnegative(),
  passed: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
});
export type TSszCategorySummary = z.infer<typeof SszCategorySummary>;

export const SszValidationReport = z.object({
  schema_version: z.literal("ssz_validation_report/1"),
  kind: z.literal("ssz_validation_report"),
  generated_at_iso: z.string().datetime(),
  run_id: z.string().min(1),
  outcomes: z.array(SszValidationOutcome),
  summary: z.object({
    total: z.number().int().nonnegative(),
    passed: z.number().int().nonnegative(),
    failed: z.number().int().nonnegative(),
    pass_rate: z.number().min(0).max(100),
    categories: z.record(SszValidationCategory, SszCategorySummary),
  }),
});
export type TSszValidationReport = z.infer<typeof SszValidationReport>;

const csvNumber = z.coerce.number().finite();

export const SszGoldenRow = z.object({
  name: z.string().trim().min(1),
  mass_Msun: csvNumber.positive(),
  radius_m: csvNumber.positive(),
  velocity_mps: csvNumber,
  source: SszSourceKind,
  z_obs: csvNumber,
  z_ssz_ref: csvNumber,
  z_grsr_ref: csvNumber,
  winner_ref: SszWinner,
});
export type TSszGoldenRow = z.infer<typeof SszGoldenRow>;
