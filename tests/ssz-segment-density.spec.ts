import { describe, expect, it } from "vitest";
import { PHI } from "@shared/physics-const";
import { SszDomainError } from "../modules/ssz/errors";
import { DEFAULT_RUN_CONFIG } from "../modules/ssz/run-config";
import {
  hermiteBlend,
  hermiteBlendDerivative,
  sampleSegmentDensity,
  segmentDensity,
  xiAtHorizon,
  xiAuto,
  xiBlended,
  xiBlendedSlope,
  xiStrong,
  xiWeak,
} from "../modules/ssz/segment-density";

const config = DEFAULT_RUN_CONFIG;

describe("segment density", () => {
  it("evaluates the weak-field form r_s / 2r", () => {
    expect(xiWeak(5000, 10)).toBeCloseTo(1e-3, 15);
    expect(xiWeak(0, 10)).toBe(Number.POSITIVE_INFINITY);
  });

  it("saturates the strong-field form at the golden-ratio value at r_s", () => {
    expect(xiStrong(1, 1, PHI)).toBeCloseTo(0.8017118471377938, 12);
    expect(xiAtHorizon(PHI)).toBeCloseTo(xiStrong(2953, 2953, PHI), 15);
    expect(xiStrong(100, 1, PHI)).toBeCloseTo(1, 12);
    expect(xiStrong(1, 1, PHI, 0.5)).toBeCloseTo(0.4008559235688969, 12);
  });

  it("rejects a non-positive Schwarzschild radius", () => {
    expect(() => xiWeak(10, 0)).toThrow(SszDomainError);
    expect(() => xiWeak(10, -1)).toThrow(SszDomainError);
    expect(() => xiStrong(10, Number.NaN, PHI)).toThrow(SszDomainError);
    expect(() => segmentDensity(10, 0, "auto", config)).toThrow(/Schwarzschild radius must be positive/);
  });

  it("uses the pure forms outside the blend zone", () => {
    expect(xiBlended(1.8, 1, config)).toBe(xiStrong(1.8, 1, PHI));
    expect(xiBlended(1.2, 1, config)).toBe(xiStrong(1.2, 1, PHI));
    expect(xiBlended(2.2, 1, config)).toBe(xiWeak(2.2, 1));
    expect(xiBlended(50, 1, config)).toBe(0.01);
  });

  it("mixes the two forms with the quintic weight inside the blend zone", () => {
    expect(xiBlended(2.0, 1, config)).toBeCloseTo(0.6053409042172472, 12);
    expect(xiAuto(2.0, 1, config)).toBe(xiBlended(2.0, 1, config));
  });

  it("has a quintic blend with flat ends", () => {
    expect(hermiteBlend(0)).toBe(0);
    expect(hermiteBlend(1)).toBe(1);
    expect(hermiteBlend(0.5)).toBe(0.5);
    expect(hermiteBlendDerivative(0)).toBe(0);
    expect(hermiteBlendDerivative(1)).toBe(0);
    expect(hermiteBlendDerivative(0.5)).toBeCloseTo(1.875, 12);
  });

  it("differentiates the blended profile in closed form", () => {
    expect(xiBlendedSlope(2.0, 1, config)).toBeCloseTo(-3.362011891872106, 12);
    const step = 1e-6;
    const central = (xiBlended(1.9 + step, 1, config) - xiBlended(1.9 - step, 1, config)) / (2 * step);
    expect(xiBlendedSlope(1.9, 1, config)).toBeCloseTo(central, 6);
    expect(xiBlendedSlope(1.8, 1, config)).toBeCloseTo(PHI * Math.exp(-PHI * 1.8), 14);
    expect(xiBlendedSlope(2.2, 1, config)).toBeCloseTo(-1 / (2 * 2.2 * 2.2), 14);
  });

  it("dispatches on the closed mode enum", () => {
    expect(segmentDensity(4, 1, "weak", config)).toBe(0.125);
    expect(segmentDensity(4, 1, "strong", config)).toBe(xiStrong(4, 1, PHI));
    expect(segmentDensity(2.0, 1, "auto", config)).toBe(xiBlended(2.0, 1, config));
  });

  it("samples a radius grid into a typed array", () => {
    const radii = Float64Array.from([2, 4, 8]);
    const xi = sampleSegmentDensity(radii, 1, "weak", config);
    expect(xi).toBeInstanceOf(Float64Array);
    expect(Array.from(xi)).toEqual([0.25, 0.125, 0.0625]);
  });

  it("stays non-negative across near and far radii", () => {
    const radii = Float64Array.from([0.01, 0.5, 1, 1.9, 2.1, 3, 12, 1e6]);
    for (const value of sampleSegmentDensity(radii, 1, "auto", config)) {
      expect(value).toBeGreaterThanOrEqual(0);
    }
  });
});
