import { dilationSsz, dualVelocity } from "../../../../modules/ssz/dilation";
import { schwarzschildRadiusSolar } from "../../../../modules/ssz/geometry";
import { segmentDensity } from "../../../../modules/ssz/segment-density";
import { calculateObject } from "../orchestrator";
import { parseCelestialObject } from "../object-input";
import { compareAbsolute, compareRelative, type SszCheck } from "./outcome";
import { logGrid } from "./physical-limits";

const category = "numerical_precision" as const;

const dualVelocityCheck = (multiple: number): SszCheck => ({
  id: `precision.dual_velocity_${multiple}rs`,
  category,
  label: `v_esc · v_fall = c² at ${multiple} r_s`,
  tolerance: 1e-10,
  run: ({ config }) => {
    const { c } = config.constants;
    const r_s = schwarzschildRadiusSolar(10, config.constants);
    const { v_esc, v_fall } = dualVelocity(multiple * r_s, r_s, c);
    return compareRelative(v_esc * v_fall, c * c, 1e-10);
  },
});

export const DETERMINISM_REPEATS = 5;

export const numericalPrecisionChecks: SszCheck[] = [
  {
    id: "precision.dilation_identity_sweep",
    category,
    label: "max |D_SSZ·(1 + Ξ) − 1| over 1.01 to 1000 r_s",
    tolerance: 1e-10,
    run: ({ config }) => {
      let worst = 0;
      for (const r of logGrid(1.01, 1000, 500)) {
        const xi = segmentDensity(r, 1, config.xiMode, config);
        const D = dilationSsz(r, 1, config.xiMode, config);
        worst = Math.max(worst, Math.abs(D * (1 + xi) - 1));
      }
      return compareAbsolute(worst, 0, 1e-10);
    },
  },
  ...[2, 5, 10, 100].map(dualVelocityCheck),
  {
    id: "precision.winner_determinism",
    category,
    label: `identical results over ${DETERMINISM_REPEATS} calls (10 M☉, 3 r_s, 1e7 m/s)`,
    tolerance: 0,
    run: ({ config }) => {
      const r_s = schwarzschildRadiusSolar(10, config.constants);
      const object = parseCelestialObject(
        { name: "determinism-check", mass_Msun: 10, radius_m: 3 * r_s, velocity_mps: 1e7, z_obs: 0.2285 },
        config.constants,
      );
      const runs = Array.from({ length: DETERMINISM_REPEATS }, () => calculateObject(object, config));
      const first = JSON.stringify(runs[0]);
      const identical = runs.every((run) => JSON.stringify(run) === first);
      const winners = Array.from(new Set(runs.map((run) => run.observation?.winner ?? "none")));
      return {
        pass: identical && winners.length === 1,
        expected: winners[0],
        computed: winners.join(","),
        diagnosis: identical ? "" : "results differ between calls",
      };
    },
  },
];
