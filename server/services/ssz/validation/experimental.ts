import {
  ARCSEC_PER_RAD,
  AU,
  M_EARTH,
  M_SUN,
  R_EARTH,
  R_SUN,
  SECONDS_PER_DAY,
} from "@shared/physics-const";
import type { TSszRunConfig } from "@shared/ssz";
import { clockRateDifference, dilationGr, dilationSsz, fractionalFrequencyShift } from "../../../../modules/ssz/dilation";
import { schwarzschildRadius, schwarzschildRadiusSolar } from "../../../../modules/ssz/geometry";
import {
  findUniversalIntersection,
  INTERSECTION_D_STAR,
  INTERSECTION_R_OVER_RS,
} from "../../../../modules/ssz/intersection";
import { energyNormalization } from "../../../../modules/ssz/power-law";
import { lightDeflection, perihelionPrecessionPerCentury } from "../../../../modules/ssz/ppn";
import { xiWeak } from "../../../../modules/ssz/segment-density";
import { calculateObject } from "../orchestrator";
import { parseCelestialObject } from "../object-input";
import { compareRelative, type SszCheck } from "./outcome";

const category = "experimental" as const;

// Mean GPS orbital radius (m).
const GPS_ORBIT_RADIUS = 2.6561e7;
const POUND_REBKA_HEIGHT = 22.5;
const OPTICAL_CLOCK_HEIGHT = 0.33;
const TOWER_HEIGHT = 450;

const MERCURY = { a_AU: 0.387098, e: 0.20563, periodYears: 0.240846 };

/** Fractional rate gain of a clock raised by height_m above the Earth's surface. */
const earthClockShift = (config: TSszRunConfig, height_m: number): number => {
  const r_s = schwarzschildRadius(M_EARTH, config.constants);
  return fractionalFrequencyShift(xiWeak(R_EARTH, r_s), xiWeak(R_EARTH + height_m, r_s));
};

const neutronStarCheck = (mass_Msun: number, radius_m: number): SszCheck => ({
  id: `experimental.neutron_star_delta_m_${mass_Msun}`,
  category,
  label: `Δ(M) > 0 for a ${mass_Msun} M☉ neutron star at ${radius_m / 1000} km`,
  tolerance: 0,
  run: ({ config }) => {
    const star = calculateObject(
      parseCelestialObject({ name: `ns-${mass_Msun}`, mass_Msun, radius_m }, config.constants),
      config,
    );
    const pass = star.regime !== "weak" && star.delta_m_pct > 0;
    return {
      pass,
      expected: "> 0",
      computed: star.delta_m_pct,
      diagnosis: pass ? `regime ${star.regime}` : `regime ${star.regime} applied no correction`,
    };
  },
});

export const experimentalChecks: SszCheck[] = [
  {
    id: "experimental.gps_clock_offset",
    category,
    label: "GPS gravitational clock gain ≈ 45.7 µs/day",
    tolerance: 0.01,
    run: ({ config }) => {
      const r_s = schwarzschildRadius(M_EARTH, config.constants);
      const perDay =
        clockRateDifference(xiWeak(R_EARTH, r_s), xiWeak(GPS_ORBIT_RADIUS, r_s)) * SECONDS_PER_DAY * 1e6;
      return compareRelative(perDay, 45.7, 0.01);
    },
  },
  {
    id: "experimental.pound_rebka",
    category,
    label: "Pound–Rebka shift over 22.5 m ≈ 2.46e-15",
    tolerance: 0.01,
    run: ({ config }) => compareRelative(earthClockShift(config, POUND_REBKA_HEIGHT), 2.46e-15, 0.01),
  },
  {
    id: "experimental.optical_clock_33cm",
    category,
    label: "optical clock shift over 33 cm ≈ 4e-17",
    tolerance: 0.5,
    run: ({ config }) => compareRelative(earthClockShift(config, OPTICAL_CLOCK_HEIGHT), 4e-17, 0.5),
  },
  {
    id: "experimental.tower_450m",
    category,
    label: "clock at the top of a 450 m tower runs fast",
    tolerance: 0,
    run: ({ config }) => {
      const nsPerDay = earthClockShift(config, TOWER_HEIGHT) * SECONDS_PER_DAY * 1e9;
      return { pass: nsPerDay > 0, expected: "> 0", computed: nsPerDay };
    },
  },
  {
    id: "experimental.earth_weak_field_agreement",
    category,
    label: "D_SSZ matches D_GR at the Earth's surface",
    tolerance: 1e-12,
    run: ({ config }) => {
      const r_s = schwarzschildRadius(M_EARTH, config.constants);
      const ssz = dilationSsz(R_EARTH, r_s, "weak", config);
      const gr = dilationGr(R_EARTH, r_s);
      const difference = Math.abs(ssz - gr) / gr;
      return { pass: difference <= 1e-12, expected: 0, computed: difference };
    },
  },
  {
    id: "experimental.solar_light_deflection",
    category,
    label: "light deflection at the solar limb ≈ 1.75″",
    tolerance: 0.01,
    run: ({ config }) => compareRelative(lightDeflection(M_SUN, R_SUN, config.constants) * ARCSEC_PER_RAD, 1.75, 0.01),
  },
  {
    id: "experimental.mercury_perihelion",
    category,
    label: "Mercury perihelion advance ≈ 42.98″ per century",
    tolerance: 1e-3,
    run: ({ config }) => {
      const arcsec =
        perihelionPrecessionPerCentury(M_SUN, MERCURY.a_AU * AU, MERCURY.e, MERCURY.periodYears, config.constants) *
        ARCSEC_PER_RAD;
      return compareRelative(arcsec, 42.98, 1e-3);
    },
  },
  neutronStarCheck(1.4, 12_000),
  neutronStarCheck(2.0, 13_000),
  {
    id: "experimental.power_law_sun",
    category,
    label: "power-law energy normalisation ≈ 1 for the Sun",
    tolerance: 1e-5,
    run: ({ config }) => {
      const E = energyNormalization(schwarzschildRadiusSolar(1, config.constants), R_SUN, config.params);
      return { pass: E > 1 && E - 1 < 1e-5, expected: 1, computed: E };
    },
  },
  {
    id: "experimental.power_law_neutron_star",
    category,
    label: "power-law energy normalisation for a 2 M☉, 13 km star",
    tolerance: 1e-4,
    run: ({ config }) =>
      compareRelative(energyNormalization(schwarzschildRadiusSolar(2, config.constants), 13_000, config.params), 1.14686, 1e-4),
  },
  {
    id: "experimental.universal_intersection_radius",
    category,
    label: `D_SSZ and D_GR cross at r/r_s ≈ ${INTERSECTION_R_OVER_RS}`,
    tolerance: 1e-5,
    run: ({ config }) => compareRelative(findUniversalIntersection(config).r_over_rs, INTERSECTION_R_OVER_RS, 1e-5),
  },
  {
    id: "experimental.universal_intersection_dilation",
    category,
    label: `dilation at the crossing ≈ ${INTERSECTION_D_STAR}`,
    tolerance: 1e-5,
    run: ({ config }) => compareRelative(findUniversalIntersection(config).D_star, INTERSECTION_D_STAR, 1e-5),
  },
];
