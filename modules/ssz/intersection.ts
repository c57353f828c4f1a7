import type { TSszRunConfig } from "@shared/ssz";
import { dilationGr, dilationSsz } from "./dilation";

type IntersectionConfig = Pick<TSszRunConfig, "constants" | "params">;

// Reference crossing of the strong-field SSZ and GR dilation curves.
export const INTERSECTION_R_OVER_RS = 1.386562;
export const INTERSECTION_D_STAR = 0.528007;

export type IntersectionPoint = {
  r_over_rs: number;
  D_star: number;
  iterations: number;
};

const MAX_ITERATIONS = 200;
const X_TOLERANCE = 1e-13;

/**
 * Bisect D_SSZ(strong) − D_GR on (lower, upper) in units of r_s. The curves
 * depend on r/r_s only, so r_s = 1 is used throughout.
 */
export function findUniversalIntersection(
  config: IntersectionConfig,
  bracket: { lower: number; upper: number } = { lower: 1.05, upper: 3 },
): IntersectionPoint {
  const gap = (x: number) => dilationSsz(x, 1, "strong", config) - dilationGr(x, 1);
  let lo = bracket.lower;
  let hi = bracket.upper;
  let gapLo = gap(lo);
  if (gapLo * gap(hi) > 0) {
    throw new RangeError(`no sign change of D_SSZ - D_GR on [${lo}, ${hi}]`);
  }
  let iterations = 0;
  while (hi - lo > X_TOLERANCE && iterations < MAX_ITERATIONS) {
    const mid = 0.5 * (lo + hi);
    const gapMid = gap(mid);
    if (gapMid === 0) {
      lo = mid;
      hi = mid;
      break;
    }
    if (gapLo * gapMid < 0) {
      hi = mid;
    } else {
      lo = mid;
      gapLo = gapMid;
    }
    iterations += 1;
  }
  const r_over_rs = 0.5 * (lo + hi);
  return { r_over_rs, D_star: dilationGr(r_over_rs, 1), iterations };
}
