import type { TSszPhysicalConstants } from "@shared/ssz";
import { schwarzschildRadius } from "./geometry";

// The model reproduces GR at first post-Newtonian order.
export const PPN_GAMMA = 1;
export const PPN_BETA = 1;

type PpnConstants = Pick<TSszPhysicalConstants, "G" | "c">;

/** Deflection (1 + γ)·r_s/b in radians. */
export function lightDeflection(M_kg: number, b_m: number, constants: PpnConstants, gamma = PPN_GAMMA): number {
  if (!(b_m > 0)) return Number.POSITIVE_INFINITY;
  return ((1 + gamma) * schwarzschildRadius(M_kg, constants)) / b_m;
}

/** Grazing-incidence Shapiro delay (1 + γ)(r_s/c)·ln(4 r1 r2 / b²), in seconds. */
export function shapiroDelay(
  M_kg: number,
  r1_m: number,
  r2_m: number,
  b_m: number,
  constants: PpnConstants,
  gamma = PPN_GAMMA,
): number {
  if (!(b_m > 0)) return Number.POSITIVE_INFINITY;
  if (!(r1_m > 0) || !(r2_m > 0)) return Number.NaN;
  const r_s = schwarzschildRadius(M_kg, constants);
  return (1 + gamma) * (r_s / constants.c) * Math.log((4 * r1_m * r2_m) / (b_m * b_m));
}

/** Perihelion advance per orbit in radians: 6πGM/(c²a(1−e²))·(2 + 2γ − β)/3. */
export function perihelionPrecession(
  M_kg: number,
  a_m: number,
  e: number,
  constants: PpnConstants,
  gamma = PPN_GAMMA,
  beta = PPN_BETA,
): number {
  if (!(a_m > 0) || e >= 1) return Number.NaN;
  const { G, c } = constants;
  const ppnFactor = (2 + 2 * gamma - beta) / 3;
  return ((6 * Math.PI * G * M_kg) / (c * c * a_m * (1 - e * e))) * ppnFactor;
}

export const perihelionPrecessionPerCentury = (
  M_kg: number,
  a_m: number,
  e: number,
  periodYears: number,
  constants: PpnConstants,
): number => perihelionPrecession(M_kg, a_m, e, constants) * (100 / periodYears);
