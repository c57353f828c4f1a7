import type {
  TSszPhysicalConstants,
  TSszRedshiftMethod,
  TSszRegime,
  TSszRunConfig,
  TSszSourceKind,
} from "@shared/ssz";
import { schwarzschildRadius } from "./geometry";

type RedshiftConfig = Pick<TSszRunConfig, "constants" | "params">;

/**
 * GR gravitational redshift z = 1/√(1 − r_s/r) − 1.
 * NaN for non-positive mass or radius and at or inside r_s.
 */
export function zGravitational(M_kg: number, r_m: number, constants: TSszPhysicalConstants): number {
  if (!(M_kg > 0) || !(r_m > 0)) return Number.NaN;
  const r_s = schwarzschildRadius(M_kg, constants);
  if (r_m <= r_s) return Number.NaN;
  return 1 / Math.sqrt(1 - r_s / r_m) - 1;
}

/** Special-relativistic Doppler z = γ(1 + β_los) − 1; zero when the speed is absent. */
export function zDoppler(v_mps: number | null | undefined, v_los_mps: number | null | undefined, c: number): number {
  if (v_mps == null || !Number.isFinite(v_mps)) return 0;
  const beta = Math.abs(v_mps) / c;
  if (beta >= 1) return Number.NaN;
  const betaLos = v_los_mps != null && Number.isFinite(v_los_mps) ? v_los_mps / c : 0;
  const gamma = 1 / Math.sqrt(1 - beta * beta);
  return gamma * (1 + betaLos) - 1;
}

const componentOrZero = (z: number | null | undefined): number =>
  z != null && Number.isFinite(z) ? z : 0;

/** (1 + a)(1 + b) − 1 with an absent or non-finite component counted as zero. */
export function zCombined(a: number | null | undefined, b: number | null | undefined): number {
  return (1 + componentOrZero(a)) * (1 + componentOrZero(b)) - 1;
}

export function zFromDilation(D: number): number {
  if (!(D > 0) || !Number.isFinite(D)) return Number.NaN;
  return 1 / D - 1;
}

/** A·e^(−α·r_s) + B, in percent, before mass-range normalisation. */
export function deltaMassRaw(M_kg: number, config: RedshiftConfig): number {
  const { deltaA, deltaAlpha, deltaB, deltaMEnabled } = config.params;
  if (!deltaMEnabled) return 0;
  const r_s = schwarzschildRadius(M_kg, config.constants);
  return deltaA * Math.exp(-deltaAlpha * r_s) + deltaB;
}

/** Position of log10(M/kg) inside [logMassMin, logMassMax], clamped to [0, 1]. */
export function deltaMassNormalization(M_kg: number, config: RedshiftConfig): number {
  const { logMassMin, logMassMax } = config.params;
  const span = logMassMax - logMassMin;
  if (span <= 0) return 1;
  const logMass = M_kg > 0 ? Math.log10(M_kg) : 30;
  return Math.min(1, Math.max(0, (logMass - logMassMin) / span));
}

/**
 * Δ(M) in percent. Callers in the weak regime must not apply it; see
 * composeSszRedshift, which is the only place it is gated.
 */
export const deltaMassCorrection = (M_kg: number, config: RedshiftConfig): number =>
  deltaMassRaw(M_kg, config) * deltaMassNormalization(M_kg, config);

/**
 * Geometric redshift for orbiting sources: the mass is inflated by Δ(M), then
 * z = 1/√(1 − β·φ/2) − 1 with β = 2GM_eff/(r c²). +∞ once the radicand closes.
 */
export function zGeometricHint(M_kg: number, r_m: number, config: RedshiftConfig): number {
  const { G, c, phi } = config.constants;
  const M_eff = M_kg * (1 + deltaMassRaw(M_kg, config) / 100);
  const beta = (2 * G * M_eff) / (r_m * c * c);
  const factor = 1 - (beta * phi) / 2;
  if (factor <= 0) return Number.POSITIVE_INFINITY;
  return 1 / Math.sqrt(factor) - 1;
}

export type SszRedshiftInput = {
  M_kg: number;
  r_m: number;
  v_mps: number;
  v_los_mps: number;
  regime: TSszRegime;
  source: TSszSourceKind;
};

export type SszRedshiftComponents = {
  z_gr: number;
  z_sr: number;
  z_grsr: number;
  z_ssz_grav: number;
  z_ssz_total: number;
  delta_m_pct: number;
  method: TSszRedshiftMethod;
};

/**
 * Full redshift breakdown for one emitter. In the weak regime the SSZ
 * gravitational term is the GR term itself and Δ(M) is zero, whatever the
 * source kind. Elsewhere surface sources get z_gr·(1 + Δ/100) and orbiting
 * sources get the geometric hint in its place.
 */
export function composeSszRedshift(input: SszRedshiftInput, config: RedshiftConfig): SszRedshiftComponents {
  const z_gr = zGravitational(input.M_kg, input.r_m, config.constants);
  const z_sr = zDoppler(input.v_mps, input.v_los_mps, config.constants.c);
  const z_grsr = zCombined(z_gr, z_sr);

  let z_ssz_grav: number;
  let delta_m_pct: number;
  let method: TSszRedshiftMethod;

  if (input.regime === "weak") {
    z_ssz_grav = z_gr;
    delta_m_pct = 0;
    method = "gr_weak_field";
  } else if (input.source === "orbit") {
    z_ssz_grav = zGeometricHint(input.M_kg, input.r_m, config);
    delta_m_pct = deltaMassRaw(input.M_kg, config);
    method = "geometric_hint";
  } else {
    delta_m_pct = deltaMassCorrection(input.M_kg, config);
    z_ssz_grav = z_gr * (1 + delta_m_pct / 100);
    method = "delta_m";
  }

  return {
    z_gr,
    z_sr,
    z_grsr,
    z_ssz_grav,
    z_ssz_total: zCombined(z_ssz_grav, z_sr),
    delta_m_pct,
    method,
  };
}
