import type { TSszRunConfig, TSszXiMode } from "@shared/ssz";
import { SszDomainError } from "./errors";

type XiConfig = Pick<TSszRunConfig, "constants" | "params">;

const assertSchwarzschildRadius = (r_s: number) => {
  if (!Number.isFinite(r_s) || r_s <= 0) {
    throw new SszDomainError(`Schwarzschild radius must be positive, got ${r_s}`);
  }
};

// Quintic smoothstep: h(0)=0, h(1)=1, h'(0)=h'(1)=0.
export const hermiteBlend = (t: number): number => t * t * t * (t * (6 * t - 15) + 10);

export const hermiteBlendDerivative = (t: number): number => 30 * t * t * (t - 1) * (t - 1);

/** Ξ_weak(r) = r_s / (2r). Far-field form; +∞ for r ≤ 0. */
export function xiWeak(r: number, r_s: number): number {
  assertSchwarzschildRadius(r_s);
  if (r <= 0) return Number.POSITIVE_INFINITY;
  return r_s / (2 * r);
}

/**
 * Ξ_strong(r) = ξ_max · (1 − e^(−φ·r/r_s)).
 * At r = r_s this is ξ_max · (1 − e^(−φ)) ≈ 0.8017.
 */
export function xiStrong(r: number, r_s: number, phi: number, xiMax = 1): number {
  assertSchwarzschildRadius(r_s);
  return xiMax * (1 - Math.exp((-phi * r) / r_s));
}

/**
 * Strong and weak forms joined across [blendLow, blendHigh] (in units of r_s)
 * by the quintic blend. Value is continuous at both edges and the slope
 * matches each side up to the blend's vanishing derivative.
 */
export function xiBlended(r: number, r_s: number, config: XiConfig): number {
  assertSchwarzschildRadius(r_s);
  const { blendLow, blendHigh, xiMax } = config.params;
  const { phi } = config.constants;
  const x = r / r_s;
  if (x <= blendLow) return xiStrong(r, r_s, phi, xiMax);
  if (x >= blendHigh) return xiWeak(r, r_s);
  const t = (x - blendLow) / (blendHigh - blendLow);
  const h = hermiteBlend(t);
  return (1 - h) * xiStrong(r, r_s, phi, xiMax) + h * xiWeak(r, r_s);
}

/** dΞ/d(r/r_s) of the blended profile, from the closed forms of both branches. */
export function xiBlendedSlope(r: number, r_s: number, config: XiConfig): number {
  assertSchwarzschildRadius(r_s);
  const { blendLow, blendHigh, xiMax } = config.params;
  const { phi } = config.constants;
  const x = r / r_s;
  const strongSlope = xiMax * phi * Math.exp(-phi * x);
  const weakSlope = -1 / (2 * x * x);
  if (x <= blendLow) return strongSlope;
  if (x >= blendHigh) return weakSlope;
  const width = blendHigh - blendLow;
  const t = (x - blendLow) / width;
  const h = hermiteBlend(t);
  const gap = xiWeak(r, r_s) - xiStrong(r, r_s, phi, xiMax);
  return (1 - h) * strongSlope + h * weakSlope + (hermiteBlendDerivative(t) / width) * gap;
}

export const xiAuto = (r: number, r_s: number, config: XiConfig): number => xiBlended(r, r_s, config);

export function segmentDensity(r: number, r_s: number, mode: TSszXiMode, config: XiConfig): number {
  switch (mode) {
    case "weak":
      return xiWeak(r, r_s);
    case "strong":
      return xiStrong(r, r_s, config.constants.phi, config.params.xiMax);
    case "auto":
      return xiAuto(r, r_s, config);
  }
}

export const xiAtHorizon = (phi: number, xiMax = 1): number => xiMax * (1 - Math.exp(-phi));

/** Ξ sampled on a radius grid, in metres. */
export function sampleSegmentDensity(
  radii: Float64Array,
  r_s: number,
  mode: TSszXiMode,
  config: XiConfig,
): Float64Array {
  const out = new Float64Array(radii.length);
  for (let i = 0; i < radii.length; i += 1) {
    out[i] = segmentDensity(radii[i], r_s, mode, config);
  }
  return out;
}
