import type { TSszRegime, TSszRunConfig } from "@shared/ssz";
import { classifyRegime } from "../../../../modules/ssz/regime";
import { xiBlended, xiBlendedSlope, xiStrong, xiWeak } from "../../../../modules/ssz/segment-density";
import { compareAbsolute, relativeError, type SszCheck } from "./outcome";
import { linearGrid } from "./physical-limits";

const category = "regime_continuity" as const;

const BOUNDARY_CASES: ReadonlyArray<[number, TSszRegime]> = [
  [1.8, "blended"],
  [1.79, "very_close"],
  [2.2, "blended"],
  [2.21, "photon_sphere"],
  [10.0, "strong"],
  [10.01, "weak"],
];

const C0_OFFSET = 1e-9;
const C1_STEP = 1e-5;
const C2_STEP = 0.01;
export const SECOND_DERIVATIVE_BOUND = 50;

// r_s = 1, so radii below are already in units of r_s.
const xi = (config: TSszRunConfig) => (x: number) => xiBlended(x, 1, config);

type Edge = "blendLow" | "blendHigh";

const edgeChecks = (edge: Edge): SszCheck[] => [
  {
    id: `continuity.c0_${edge}`,
    category,
    label: `Ξ continuous across ${edge}`,
    tolerance: 1e-6,
    run: ({ config }) => {
      const f = xi(config);
      const e = config.params[edge];
      return compareAbsolute(f(e + C0_OFFSET) - f(e - C0_OFFSET), 0, 1e-6);
    },
  },
  {
    id: `continuity.c1_${edge}`,
    category,
    label: `slope of Ξ inside the blend matches the outer branch at ${edge}`,
    tolerance: 1e-4,
    run: ({ config }) => {
      const f = xi(config);
      const e = config.params[edge];
      // Analytic slope from inside the blend against a one-sided difference on the outer branch.
      const inner = xiBlendedSlope(e, 1, config);
      const outer = edge === "blendLow" ? (f(e) - f(e - C1_STEP)) / C1_STEP : (f(e + C1_STEP) - f(e)) / C1_STEP;
      const mismatch = relativeError(inner, outer);
      return {
        pass: mismatch <= 1e-4,
        expected: outer,
        computed: inner,
        diagnosis: mismatch <= 1e-4 ? "" : `slope mismatch ${mismatch.toExponential(3)}`,
      };
    },
  },
];

export const regimeContinuityChecks: SszCheck[] = [
  ...BOUNDARY_CASES.map(
    ([x, expected]): SszCheck => ({
      id: `continuity.classify_${x}`,
      category,
      label: `r/r_s = ${x} classified as ${expected}`,
      tolerance: 0,
      run: ({ config }) => {
        const computed = classifyRegime(x, config.params);
        return { pass: computed === expected, expected, computed };
      },
    }),
  ),
  ...edgeChecks("blendLow"),
  ...edgeChecks("blendHigh"),
  {
    id: "continuity.second_derivative_bounded",
    category,
    label: `|Ξ''| < ${SECOND_DERIVATIVE_BOUND} across the blend zone`,
    tolerance: SECOND_DERIVATIVE_BOUND,
    run: ({ config }) => {
      const f = xi(config);
      let worst = 0;
      for (const x of linearGrid(config.params.blendLow, config.params.blendHigh, 41)) {
        const d2 = (f(x + C2_STEP) - 2 * f(x) + f(x - C2_STEP)) / (C2_STEP * C2_STEP);
        worst = Math.max(worst, Math.abs(d2));
      }
      return { pass: worst < SECOND_DERIVATIVE_BOUND, expected: `< ${SECOND_DERIVATIVE_BOUND}`, computed: worst };
    },
  },
  {
    id: "continuity.blend_bounded",
    category,
    label: "blended Ξ lies between Ξ_strong and Ξ_weak",
    tolerance: 0,
    run: ({ config }) => {
      const { blendLow, blendHigh, xiMax } = config.params;
      const { phi } = config.constants;
      let violations = 0;
      for (const x of linearGrid(blendLow, blendHigh, 201)) {
        const strong = xiStrong(x, 1, phi, xiMax);
        const weak = xiWeak(x, 1);
        const value = xiBlended(x, 1, config);
        if (value < Math.min(strong, weak) || value > Math.max(strong, weak)) violations += 1;
      }
      return { pass: violations === 0, expected: 0, computed: violations };
    },
  },
];
