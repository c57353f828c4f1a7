/**
 * Physics constants (shared).
 *
 * Goal: keep the engine, the validation harness and tooling numerically
 * consistent and prevent drift. Values follow CODATA 2018 where applicable.
 */

// Speed of light in vacuum (m/s).
export const C = 299_792_458;

// Newtonian gravitational constant (m^3 kg^-1 s^-2).
export const G = 6.674_30e-11;

// Nominal solar mass (kg) and radius (m).
export const M_SUN = 1.988_47e30;
export const R_SUN = 6.963_4e8;

// Golden ratio φ = (1 + √5) / 2.
export const PHI = (1 + Math.sqrt(5)) / 2;

// Earth reference values used by clock experiments.
export const M_EARTH = 5.972e24;
export const R_EARTH = 6.371e6;

// Astronomical unit (m), as used by the PPN helpers.
export const AU = 1.496e11;

export const ARCSEC_PER_RAD = 206_265;
export const SECONDS_PER_DAY = 86_400;
