import type { TSszModelParameters } from "@shared/ssz";

type PowerLawParams = Pick<TSszModelParameters, "powerLawAlpha" | "powerLawBeta">;

/** Compactness r_s/R; +∞ for a non-positive radius. */
export function compactness(r_s: number, R_m: number): number {
  if (!(R_m > 0)) return Number.POSITIVE_INFINITY;
  return r_s / R_m;
}

/** ΔE/E_rest = α·(r_s/R)^β. */
export function energyExcess(r_s: number, R_m: number, params: PowerLawParams): number {
  const k = compactness(r_s, R_m);
  if (!Number.isFinite(k) || k <= 0) return 0;
  return params.powerLawAlpha * Math.pow(k, params.powerLawBeta);
}

/** E_obs/E_rest = 1 + α·(r_s/R)^β. */
export const energyNormalization = (r_s: number, R_m: number, params: PowerLawParams): number =>
  1 + energyExcess(r_s, R_m, params);
