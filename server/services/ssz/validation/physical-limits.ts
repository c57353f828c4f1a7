import { M_SUN, R_SUN } from "@shared/physics-const";
import { dilationSsz } from "../../../../modules/ssz/dilation";
import { schwarzschildRadius } from "../../../../modules/ssz/geometry";
import { zGravitational } from "../../../../modules/ssz/redshift";
import { sampleSegmentDensity, xiStrong, xiWeak } from "../../../../modules/ssz/segment-density";
import { calculateObject } from "../orchestrator";
import { parseCelestialObject } from "../object-input";
import type { SszCheck } from "./outcome";

const category = "physical_limits" as const;

/** n points from a to b (inclusive), geometrically spaced. */
export const logGrid = (a: number, b: number, n: number): Float64Array => {
  const out = new Float64Array(n);
  const step = Math.log(b / a) / (n - 1);
  for (let i = 0; i < n; i += 1) {
    out[i] = a * Math.exp(step * i);
  }
  return out;
};

export const linearGrid = (a: number, b: number, n: number): Float64Array => {
  const out = new Float64Array(n);
  for (let i = 0; i < n; i += 1) {
    out[i] = a + ((b - a) * i) / (n - 1);
  }
  return out;
};

const countViolations = (values: Float64Array, ok: (prev: number, next: number) => boolean): number => {
  let violations = 0;
  for (let i = 1; i < values.length; i += 1) {
    if (!ok(values[i - 1], values[i])) violations += 1;
  }
  return violations;
};

export const physicalLimitChecks: SszCheck[] = [
  {
    id: "limits.d_ssz_inside_horizon",
    category,
    label: "D_SSZ finite and positive for r ≤ r_s",
    tolerance: 0,
    run: ({ config }) => {
      let min = Number.POSITIVE_INFINITY;
      for (const x of [0.1, 0.5, 1]) {
        const D = dilationSsz(x, 1, config.xiMode, config);
        min = Number.isFinite(D) ? Math.min(min, D) : Number.NEGATIVE_INFINITY;
      }
      const pass = Number.isFinite(min) && min > 0;
      return { pass, expected: "> 0", computed: min, diagnosis: pass ? "" : "D_SSZ collapsed at or inside r_s" };
    },
  },
  {
    id: "limits.xi_non_negative",
    category,
    label: "Ξ ≥ 0 on 0.1 to 1000 r_s",
    tolerance: 0,
    run: ({ config }) => {
      const xi = sampleSegmentDensity(logGrid(0.1, 1000, 400), 1, config.xiMode, config);
      const min = Math.min(...xi);
      return { pass: min >= 0, expected: ">= 0", computed: min };
    },
  },
  {
    id: "limits.d_ssz_at_most_one",
    category,
    label: "D_SSZ ≤ 1 on 0.1 to 1000 r_s",
    tolerance: 0,
    run: ({ config }) => {
      let max = Number.NEGATIVE_INFINITY;
      for (const x of logGrid(0.1, 1000, 400)) {
        max = Math.max(max, dilationSsz(x, 1, config.xiMode, config));
      }
      return { pass: max <= 1, expected: "<= 1", computed: max };
    },
  },
  {
    id: "limits.xi_weak_non_increasing",
    category,
    label: "Ξ_weak non-increasing beyond 110 r_s",
    tolerance: 0,
    run: () => {
      const radii = logGrid(110, 1e6, 300);
      const xi = new Float64Array(radii.length);
      radii.forEach((r, i) => {
        xi[i] = xiWeak(r, 1);
      });
      const violations = countViolations(xi, (prev, next) => next <= prev);
      return { pass: violations === 0, expected: 0, computed: violations };
    },
  },
  {
    id: "limits.xi_strong_non_decreasing",
    category,
    label: "Ξ_strong non-decreasing as r rises toward r_s",
    tolerance: 0,
    run: ({ config }) => {
      const radii = linearGrid(0.01, 1, 200);
      const xi = new Float64Array(radii.length);
      radii.forEach((r, i) => {
        xi[i] = xiStrong(r, 1, config.constants.phi, config.params.xiMax);
      });
      const violations = countViolations(xi, (prev, next) => next >= prev);
      return { pass: violations === 0, expected: 0, computed: violations };
    },
  },
  {
    id: "limits.gr_redshift_at_horizon",
    category,
    label: "z_GR undefined at r = r_s",
    tolerance: 0,
    run: ({ config }) => {
      const r_s = schwarzschildRadius(M_SUN, config.constants);
      const z = zGravitational(M_SUN, r_s, config.constants);
      return { pass: Number.isNaN(z), expected: "NaN", computed: z };
    },
  },
  {
    id: "limits.sun_weak_field_contract",
    category,
    label: "Sun: weak regime, Δ(M) = 0, z_SSZ_grav = z_GR",
    tolerance: 0,
    run: ({ config }) => {
      const sun = calculateObject(
        parseCelestialObject({ name: "Sun", mass_Msun: 1, radius_m: R_SUN }, config.constants),
        config,
      );
      const pass = sun.regime === "weak" && sun.delta_m_pct === 0 && sun.z_ssz_grav === sun.z_gr;
      return {
        pass,
        expected: "weak, 0%, equal",
        computed: `${sun.regime}, ${sun.delta_m_pct}%, ${sun.z_ssz_grav === sun.z_gr ? "equal" : "different"}`,
      };
    },
  },
];
