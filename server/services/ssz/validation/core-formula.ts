import { M_SUN } from "@shared/physics-const";
import { dilationFromXi, dilationGr, dilationSsz } from "../../../../modules/ssz/dilation";
import { schwarzschildRadius, schwarzschildRadiusSolar } from "../../../../modules/ssz/geometry";
import { zCombined } from "../../../../modules/ssz/redshift";
import { segmentDensity, xiStrong, xiWeak } from "../../../../modules/ssz/segment-density";
import { compareAbsolute, compareRelative, type SszCheck } from "./outcome";

const category = "core_formula" as const;

export const coreFormulaChecks: SszCheck[] = [
  {
    id: "core.golden_ratio",
    category,
    label: "φ² = φ + 1",
    tolerance: 1e-12,
    run: ({ config }) => {
      const { phi } = config.constants;
      return compareAbsolute(phi * phi - phi - 1, 0, 1e-12);
    },
  },
  {
    id: "core.sun_schwarzschild_radius",
    category,
    label: "r_s of the Sun ≈ 2953.34 m",
    tolerance: 1e-5,
    run: ({ config }) => compareRelative(schwarzschildRadius(M_SUN, config.constants), 2953.34, 1e-5),
  },
  {
    id: "core.schwarzschild_linearity",
    category,
    label: "r_s(10 M☉) / r_s(1 M☉) = 10",
    tolerance: 1e-12,
    run: ({ config }) =>
      compareRelative(
        schwarzschildRadiusSolar(10, config.constants) / schwarzschildRadiusSolar(1, config.constants),
        10,
        1e-12,
      ),
  },
  {
    id: "core.xi_weak_formula",
    category,
    label: "Ξ_weak(r) = r_s / 2r",
    tolerance: 1e-12,
    run: () => compareRelative(xiWeak(5000, 10), 1e-3, 1e-12),
  },
  {
    id: "core.dilation_from_xi",
    category,
    label: "D_SSZ = 1 / (1 + Ξ) at 5 r_s",
    tolerance: 1e-12,
    run: ({ config }) => {
      const r_s = schwarzschildRadius(M_SUN, config.constants);
      const r = 5 * r_s;
      const xi = segmentDensity(r, r_s, config.xiMode, config);
      return compareRelative(dilationSsz(r, r_s, config.xiMode, config), dilationFromXi(xi), 1e-12);
    },
  },
  {
    id: "core.xi_at_horizon",
    category,
    label: "Ξ(r_s) ≈ 0.802",
    tolerance: 1e-3,
    run: ({ config }) => compareAbsolute(xiStrong(1, 1, config.constants.phi, config.params.xiMax), 0.802, 1e-3),
  },
  {
    id: "core.d_ssz_at_horizon",
    category,
    label: "D_SSZ(r_s) ≈ 0.555",
    tolerance: 1e-3,
    run: ({ config }) => compareAbsolute(dilationSsz(1, 1, "auto", config), 0.555, 1e-3),
  },
  {
    id: "core.d_gr_at_horizon",
    category,
    label: "D_GR(r_s) = 0",
    tolerance: 0,
    run: () => compareAbsolute(dilationGr(1, 1), 0, 0),
  },
  {
    id: "core.z_combined_identity",
    category,
    label: "z_combined(z, 0) = z",
    tolerance: 1e-15,
    run: () => compareAbsolute(zCombined(0.25, 0), 0.25, 1e-15),
  },
];
