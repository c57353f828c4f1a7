import type { TSszModelParameters, TSszRegime } from "@shared/ssz";

type RegimeBounds = Pick<TSszModelParameters, "blendLow" | "blendHigh" | "photonSphereMax" | "weakStart">;

export const REGIME_ORDER: readonly TSszRegime[] = [
  "very_close",
  "blended",
  "photon_sphere",
  "strong",
  "weak",
] as const;

/**
 * Map normalised radius x = r/r_s to its regime. Each interval after the
 * first is closed on its lower side: x = blendLow is blended, x = weakStart
 * is still strong.
 */
export function classifyRegime(x: number, bounds: RegimeBounds): TSszRegime {
  if (Number.isNaN(x)) return "weak";
  if (x < bounds.blendLow) return "very_close";
  if (x <= bounds.blendHigh) return "blended";
  if (x <= bounds.photonSphereMax) return "photon_sphere";
  if (x <= bounds.weakStart) return "strong";
  return "weak";
}

// A massless or undefined source has no strong field to speak of.
export function classifyRegimeFor(r: number, r_s: number, bounds: RegimeBounds): TSszRegime {
  if (!(r_s > 0)) return "weak";
  return classifyRegime(r / r_s, bounds);
}

export type RegimeInfo = {
  regime: TSszRegime;
  r_over_rs: number;
  usesDeltaM: boolean;
  usesBlending: boolean;
};

export function regimeInfo(r: number, r_s: number, bounds: RegimeBounds): RegimeInfo {
  const regime = classifyRegimeFor(r, r_s, bounds);
  return {
    regime,
    r_over_rs: r_s > 0 ? r / r_s : Number.POSITIVE_INFINITY,
    usesDeltaM: regime !== "weak",
    usesBlending: regime === "blended",
  };
}

export const regimeRank = (regime: TSszRegime): number => REGIME_ORDER.indexOf(regime);
