import { describe, expect, it } from "vitest";
import { C, M_SUN, R_SUN } from "@shared/physics-const";
import { schwarzschildRadius } from "../modules/ssz/geometry";
import {
  composeSszRedshift,
  deltaMassCorrection,
  deltaMassNormalization,
  deltaMassRaw,
  zCombined,
  zDoppler,
  zFromDilation,
  zGeometricHint,
  zGravitational,
} from "../modules/ssz/redshift";
import { createRunConfig, DEFAULT_RUN_CONFIG } from "../modules/ssz/run-config";

const config = DEFAULT_RUN_CONFIG;
const constants = config.constants;
const M10 = 10 * M_SUN;
const rs10 = schwarzschildRadius(M10, constants);

describe("gravitational redshift", () => {
  it("matches the Sun's surface value", () => {
    expect(zGravitational(M_SUN, R_SUN, constants) / 2.1206226674674866e-6).toBeCloseTo(1, 9);
  });

  it("is undefined at or inside r_s and for degenerate inputs", () => {
    expect(zGravitational(M10, rs10, constants)).toBeNaN();
    expect(zGravitational(M10, 0.5 * rs10, constants)).toBeNaN();
    expect(zGravitational(0, 1e6, constants)).toBeNaN();
    expect(zGravitational(-M_SUN, 1e6, constants)).toBeNaN();
    expect(zGravitational(M_SUN, 0, constants)).toBeNaN();
  });

  it("inverts a GR dilation factor", () => {
    expect(zFromDilation(0.5)).toBe(1);
    expect(zFromDilation(0)).toBeNaN();
    expect(zGravitational(M10, 4 * rs10, constants)).toBeCloseTo(zFromDilation(Math.sqrt(0.75)), 12);
  });
});

describe("Doppler and composition", () => {
  it("treats a missing speed as zero shift", () => {
    expect(zDoppler(undefined, undefined, C)).toBe(0);
    expect(zDoppler(null, 5, C)).toBe(0);
    expect(zDoppler(Number.NaN, 0, C)).toBe(0);
    expect(zDoppler(0, 0, C)).toBe(0);
  });

  it("applies the relativistic Doppler factor", () => {
    expect(zDoppler(1e7, 0, C)).toBeCloseTo(0.0005567897052045634, 15);
    expect(zDoppler(0.6 * C, 0.6 * C, C)).toBeCloseTo(1, 12);
    expect(zDoppler(0.6 * C, -0.6 * C, C)).toBeCloseTo(-0.5, 12);
  });

  it("is undefined at or above c", () => {
    expect(zDoppler(C, 0, C)).toBeNaN();
    expect(zDoppler(-2 * C, 0, C)).toBeNaN();
  });

  it("composes multiplicatively", () => {
    expect(zCombined(0.25, 0)).toBe(0.25);
    expect(zCombined(0.5, 1)).toBe(2);
    expect(zCombined(null, 0.1)).toBeCloseTo(0.1, 15);
    expect(zCombined(0.1, undefined)).toBeCloseTo(0.1, 15);
    expect(zCombined(Number.NaN, 0.1)).toBeCloseTo(0.1, 15);
    expect(zCombined(0.2, Number.POSITIVE_INFINITY)).toBeCloseTo(0.2, 15);
  });
});

describe("mass correction", () => {
  it("reduces to the constant term for stellar masses", () => {
    expect(deltaMassRaw(M_SUN, config)).toBe(1.96);
    expect(deltaMassNormalization(M_SUN, config)).toBeCloseTo(0.6343287200994006, 12);
    expect(deltaMassCorrection(M_SUN, config)).toBeCloseTo(1.243284291394825, 12);
  });

  it("clamps the log-mass normalisation", () => {
    expect(deltaMassNormalization(1e5, config)).toBe(0);
    expect(deltaMassNormalization(1e50, config)).toBe(1);
  });

  it("switches off completely when disabled", () => {
    const off = createRunConfig({ params: { deltaMEnabled: false } });
    expect(deltaMassRaw(M_SUN, off)).toBe(0);
    expect(deltaMassCorrection(M_SUN, off)).toBe(0);
  });

  it("computes the geometric hint from an inflated mass", () => {
    expect(zGeometricHint(M10, 3 * rs10, config)).toBeCloseTo(0.17440634865818527, 12);
    expect(zGeometricHint(M10, 0.5 * rs10, config)).toBe(Number.POSITIVE_INFINITY);
  });
});

describe("composeSszRedshift", () => {
  const base = { M_kg: M10, r_m: 3 * rs10, v_mps: 1e7, v_los_mps: 0 };

  it("applies Δ(M) to surface sources outside the weak field", () => {
    const z = composeSszRedshift({ ...base, regime: "photon_sphere", source: "surface" }, config);
    expect(z.method).toBe("delta_m");
    expect(z.z_gr).toBeCloseTo(0.22474487139158894, 12);
    expect(z.z_sr).toBeCloseTo(0.0005567897052045634, 15);
    expect(z.z_grsr).toBeCloseTo(0.2254267967274819, 12);
    expect(z.delta_m_pct).toBeCloseTo(1.304534291394825, 12);
    expect(z.z_ssz_grav).toBeCloseTo(0.22767674530704343, 12);
    expect(z.z_ssz_total).toBeCloseTo(0.22836030308014932, 12);
  });

  it("replaces the corrected GR term with the geometric hint for orbiting sources", () => {
    const z = composeSszRedshift({ ...base, regime: "photon_sphere", source: "orbit" }, config);
    expect(z.method).toBe("geometric_hint");
    expect(z.delta_m_pct).toBe(1.96);
    expect(z.z_ssz_grav).toBeCloseTo(0.17440634865818527, 12);
    expect(z.z_ssz_total).toBeCloseTo(0.17506024602284498, 12);
    expect(z.z_grsr).toBeCloseTo(0.2254267967274819, 12);
  });

  it("never corrects in the weak field, whatever the source", () => {
    for (const source of ["surface", "orbit"] as const) {
      const z = composeSszRedshift(
        { M_kg: M_SUN, r_m: R_SUN, v_mps: 0, v_los_mps: 0, regime: "weak", source },
        config,
      );
      expect(z.method).toBe("gr_weak_field");
      expect(z.delta_m_pct).toBe(0);
      expect(z.z_ssz_grav).toBe(z.z_gr);
      expect(z.z_ssz_total).toBe(z.z_grsr);
    }
  });
});
