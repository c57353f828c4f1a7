import type { TSszRunConfig, TSszXiMode } from "@shared/ssz";
import { segmentDensity } from "./segment-density";

type DilationConfig = Pick<TSszRunConfig, "constants" | "params">;

// r_s/r never reaches exactly 1, so the GR radicand stays positive outside r_s.
const GR_RATIO_CEILING = 1 - 1e-7;

/** D_SSZ = 1 / (1 + Ξ). Finite everywhere, D(r_s) ≈ 0.555. */
export function dilationSsz(r: number, r_s: number, mode: TSszXiMode, config: DilationConfig): number {
  return 1 / (1 + segmentDensity(r, r_s, mode, config));
}

export const dilationFromXi = (xi: number): number => 1 / (1 + xi);

/** D_GR = √(1 − r_s/r) outside the horizon, 0 at or inside it. */
export function dilationGr(r: number, r_s: number): number {
  if (!(r > r_s)) return 0;
  const ratio = Math.min(Math.max(r_s / r, 0), GR_RATIO_CEILING);
  return Math.sqrt(1 - ratio);
}

/**
 * D(ξB) − D(ξA) without subtracting two numbers that both sit next to 1.
 * Positive when B is the higher (weaker-field) clock.
 */
export const clockRateDifference = (xiA: number, xiB: number): number =>
  (xiA - xiB) / ((1 + xiA) * (1 + xiB));

/** D_high / D_low − 1, the fractional frequency shift between two clocks. */
export const fractionalFrequencyShift = (xiLow: number, xiHigh: number): number =>
  (xiLow - xiHigh) / (1 + xiHigh);

export type DualVelocity = {
  v_esc: number;
  v_fall: number;
};

/** v_esc = c·√(r_s/r), v_fall = c²/v_esc; their product is c². */
export function dualVelocity(r: number, r_s: number, c: number): DualVelocity {
  if (!(r > 0)) {
    throw new RangeError(`radius must be positive, got ${r}`);
  }
  const v_esc = c * Math.sqrt(Math.max(r_s, 0) / r);
  const v_fall = v_esc > 0 ? (c * c) / v_esc : Number.POSITIVE_INFINITY;
  return { v_esc, v_fall };
}
