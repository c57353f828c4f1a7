import { describe, expect, it } from "vitest";
import { ARCSEC_PER_RAD, AU, C, M_SUN, R_SUN } from "@shared/physics-const";
import { schwarzschildRadius, schwarzschildRadiusSolar, solarMassesToKg } from "../modules/ssz/geometry";
import {
  findUniversalIntersection,
  INTERSECTION_D_STAR,
  INTERSECTION_R_OVER_RS,
} from "../modules/ssz/intersection";
import { compactness, energyExcess, energyNormalization } from "../modules/ssz/power-law";
import {
  lightDeflection,
  perihelionPrecession,
  perihelionPrecessionPerCentury,
  PPN_BETA,
  PPN_GAMMA,
  shapiroDelay,
} from "../modules/ssz/ppn";
import { DEFAULT_RUN_CONFIG } from "../modules/ssz/run-config";

const { constants, params } = DEFAULT_RUN_CONFIG;

describe("Schwarzschild geometry", () => {
  it("scales linearly with mass", () => {
    expect(schwarzschildRadius(M_SUN, constants)).toBeCloseTo(2953.3393820668784, 8);
    expect(schwarzschildRadiusSolar(10, constants) / schwarzschildRadiusSolar(1, constants)).toBeCloseTo(10, 12);
    expect(solarMassesToKg(2, constants)).toBe(2 * M_SUN);
    expect(schwarzschildRadius(0, constants)).toBe(0);
  });

  it("rejects negative masses", () => {
    expect(() => schwarzschildRadius(-1, constants)).toThrow(RangeError);
  });
});

describe("power-law energy normalisation", () => {
  it("is barely above one for the Sun", () => {
    const r_s = schwarzschildRadiusSolar(1, constants);
    expect(energyExcess(r_s, R_SUN, params)).toBeCloseTo(1.6867160206324172e-6, 15);
  });

  it("grows with compactness", () => {
    const ns = energyNormalization(schwarzschildRadiusSolar(2, constants), 13_000, params);
    const wd = energyNormalization(schwarzschildRadiusSolar(1, constants), 6e6, params);
    expect(ns).toBeCloseTo(1.1468637467011882, 10);
    expect(wd).toBeCloseTo(1.0001797854196062, 12);
    expect(ns).toBeGreaterThan(wd);
  });

  it("treats a degenerate radius as no excess", () => {
    expect(compactness(1, 0)).toBe(Number.POSITIVE_INFINITY);
    expect(energyExcess(1, 0, params)).toBe(0);
    expect(energyNormalization(0, 1e4, params)).toBe(1);
  });
});

describe("PPN observables", () => {
  it("uses the GR parameters", () => {
    expect(PPN_GAMMA).toBe(1);
    expect(PPN_BETA).toBe(1);
  });

  it("deflects starlight at the solar limb by 1.75 arcsec", () => {
    expect(lightDeflection(M_SUN, R_SUN, constants) * ARCSEC_PER_RAD).toBeCloseTo(1.7496353724962654, 10);
    expect(lightDeflection(M_SUN, 0, constants)).toBe(Number.POSITIVE_INFINITY);
  });

  it("advances Mercury's perihelion by 43 arcsec per century", () => {
    const arcsec = perihelionPrecessionPerCentury(M_SUN, 0.387098 * AU, 0.20563, 0.240846, constants) * ARCSEC_PER_RAD;
    expect(arcsec).toBeCloseTo(42.98146220481029, 8);
    expect(perihelionPrecession(M_SUN, AU, 1, constants)).toBeNaN();
  });

  it("delays a grazing radar echo", () => {
    const r_s = schwarzschildRadius(M_SUN, constants);
    const delay = shapiroDelay(M_SUN, AU, AU, R_SUN, constants);
    expect(delay).toBeCloseTo(2 * (r_s / C) * Math.log((4 * AU * AU) / (R_SUN * R_SUN)), 15);
    expect(delay).toBeGreaterThan(1e-4);
    expect(shapiroDelay(M_SUN, 0, AU, R_SUN, constants)).toBeNaN();
  });
});

describe("universal intersection", () => {
  it("finds the crossing of the strong-field SSZ and GR dilation", () => {
    const point = findUniversalIntersection(DEFAULT_RUN_CONFIG);
    expect(point.r_over_rs).toBeCloseTo(1.3865616196486967, 9);
    expect(point.D_star).toBeCloseTo(0.5280071198891448, 9);
    expect(point.r_over_rs).toBeCloseTo(INTERSECTION_R_OVER_RS, 5);
    expect(point.D_star).toBeCloseTo(INTERSECTION_D_STAR, 5);
    expect(point.iterations).toBeGreaterThan(0);
  });

  it("refuses a bracket without a sign change", () => {
    expect(() => findUniversalIntersection(DEFAULT_RUN_CONFIG, { lower: 2, upper: 3 })).toThrow(RangeError);
  });
});
