import type {
  SszCalculationResult,
  SszObservation,
  TSszCelestialObject,
  TSszRegime,
  TSszRunConfig,
  TSszWinner,
} from "@shared/ssz";
import { dilationGr, dilationSsz } from "../../../modules/ssz/dilation";
import { schwarzschildRadius, solarMassesToKg } from "../../../modules/ssz/geometry";
import { INTERSECTION_R_OVER_RS } from "../../../modules/ssz/intersection";
import { compactness, energyExcess, energyNormalization } from "../../../modules/ssz/power-law";
import { composeSszRedshift } from "../../../modules/ssz/redshift";
import { classifyRegimeFor } from "../../../modules/ssz/regime";
import { segmentDensity } from "../../../modules/ssz/segment-density";
import { parseCelestialObject } from "./object-input";

export const WINNER_RELATIVE_EPSILON = 1e-12;
const WINNER_ABSOLUTE_FLOOR = 1e-20;

const magnitude = (residual: number) =>
  Number.isFinite(residual) ? Math.abs(residual) : Number.POSITIVE_INFINITY;

/**
 * Compare two residuals by magnitude. Within ε = 1e-12·max(|a|, |b|, 1e-20)
 * the result is a TIE. A non-finite residual never wins against a finite one.
 */
export function determineWinner(residualSsz: number, residualGr: number): TSszWinner {
  const a = magnitude(residualSsz);
  const b = magnitude(residualGr);
  if (!Number.isFinite(a) && !Number.isFinite(b)) return "TIE";
  if (!Number.isFinite(a)) return "GR";
  if (!Number.isFinite(b)) return "SSZ";
  const epsilon = WINNER_RELATIVE_EPSILON * Math.max(a, b, WINNER_ABSOLUTE_FLOOR);
  if (Math.abs(a - b) <= epsilon) return "TIE";
  return a < b ? "SSZ" : "GR";
}

const observe = (
  z_obs: number | null,
  z_ssz_total: number,
  z_grsr: number,
  degenerate: boolean,
): SszObservation | null => {
  if (z_obs == null || degenerate) return null;
  const residual_ssz = z_ssz_total - z_obs;
  const residual_grsr = z_grsr - z_obs;
  return Object.freeze({
    z_obs,
    residual_ssz,
    residual_grsr,
    winner: determineWinner(residual_ssz, residual_grsr),
  });
};

export function calculateObject(object: TSszCelestialObject, config: TSszRunConfig): SszCalculationResult {
  const M_kg = solarMassesToKg(object.mass_Msun, config.constants);
  const r = object.radius_m;
  const r_s = schwarzschildRadius(M_kg, config.constants);
  const regime = classifyRegimeFor(r, r_s, config.params);
  const xi = segmentDensity(r, r_s, config.xiMode, config);
  const redshift = composeSszRedshift(
    {
      M_kg,
      r_m: r,
      v_mps: object.velocity_mps,
      v_los_mps: object.velocity_los_mps,
      regime,
      source: object.source,
    },
    config,
  );

  const D_ssz = dilationSsz(r, r_s, config.xiMode, config);
  const D_gr = dilationGr(r, r_s);
  const r_star_m = INTERSECTION_R_OVER_RS * r_s;
  const degenerate = !Number.isFinite(redshift.z_gr);

  return Object.freeze({
    name: object.name,
    mass_Msun: object.mass_Msun,
    radius_m: r,
    velocity_mps: object.velocity_mps,
    source: object.source,
    r_s_m: r_s,
    r_over_rs: r / r_s,
    regime,
    xi,
    D_ssz,
    D_gr,
    D_delta: D_ssz - D_gr,
    D_delta_pct: D_gr > 0 ? (100 * (D_ssz - D_gr)) / D_gr : Number.NaN,
    ...redshift,
    compactness: compactness(r_s, r),
    E_norm: energyNormalization(r_s, r, config.params),
    E_excess_pct: 100 * energyExcess(r_s, r, config.params),
    r_star_m,
    D_at_intersection: dilationSsz(r_star_m, r_s, "strong", config),
    run_id: config.runId,
    degenerate,
    observation: observe(object.z_obs, redshift.z_ssz_total, redshift.z_grsr, degenerate),
  });
}

export type SszBatchRow =
  | { ok: true; result: SszCalculationResult }
  | { ok: false; index: number; name: string | null; error: string };

const rowName = (raw: unknown): string | null => {
  if (!raw || typeof raw !== "object") return null;
  const name = Object.getOwnPropertyDescriptor(raw, "name")?.value;
  return typeof name === "string" && name.trim() ? name.trim() : null;
};

/** Element-wise map over raw rows. Output order equals input order; failed rows stay in place. */
export function calculateBatch(rows: readonly unknown[], config: TSszRunConfig): SszBatchRow[] {
  return rows.map((raw, index): SszBatchRow => {
    try {
      const object = parseCelestialObject(raw, config.constants);
      return { ok: true, result: calculateObject(object, config) };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { ok: false, index, name: rowName(raw), error: message };
    }
  });
}

type ResidualStats = { mean: number | null; std: number | null; mae: number | null };

export type SszBatchSummary = {
  total: number;
  observed: number;
  degenerate: number;
  wins: Record<TSszWinner, number>;
  /** Percentage of observed rows SSZ wins, ties included in the denominator. */
  ssz_win_rate: number | null;
  residual_ssz: ResidualStats;
  residual_grsr: ResidualStats;
  regimes: Record<TSszRegime, number>;
};

// Sample standard deviation (n − 1); null below two values.
const residualStats = (values: number[]): ResidualStats => {
  const finite = values.filter((value) => Number.isFinite(value));
  if (!finite.length) return { mean: null, std: null, mae: null };
  const n = finite.length;
  const mean = finite.reduce((acc, value) => acc + value, 0) / n;
  const mae = finite.reduce((acc, value) => acc + Math.abs(value), 0) / n;
  const squares = finite.reduce((acc, value) => acc + (value - mean) ** 2, 0);
  return { mean, std: n > 1 ? Math.sqrt(squares / (n - 1)) : null, mae };
};

/**
 * Aggregate a set of results. Degenerate rows are counted on their own and
 * stay out of the win totals and residual statistics.
 */
export function summarizeResults(results: readonly SszCalculationResult[]): SszBatchSummary {
  const wins: Record<TSszWinner, number> = { SSZ: 0, GR: 0, TIE: 0 };
  const regimes: Record<TSszRegime, number> = { very_close: 0, blended: 0, photon_sphere: 0, strong: 0, weak: 0 };
  const residualsSsz: number[] = [];
  const residualsGr: number[] = [];
  let degenerate = 0;
  for (const result of results) {
    regimes[result.regime] += 1;
    if (result.degenerate) {
      degenerate += 1;
      continue;
    }
    if (!result.observation) continue;
    wins[result.observation.winner] += 1;
    residualsSsz.push(result.observation.residual_ssz);
    residualsGr.push(result.observation.residual_grsr);
  }
  const observed = residualsSsz.length;
  return {
    total: results.length,
    observed,
    degenerate,
    wins,
    ssz_win_rate: observed > 0 ? (100 * wins.SSZ) / observed : null,
    residual_ssz: residualStats(residualsSsz),
    residual_grsr: residualStats(residualsGr),
    regimes,
  };
}
