import fs from "node:fs/promises";
import path from "node:path";
import { createReadStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import { parse } from "csv-parse";
import {
  SszGoldenRow,
  type SszCalculationResult,
  type TSszGoldenRow,
  type TSszRunConfig,
  type TSszWinner,
} from "@shared/ssz";
import { GoldenDatasetError } from "../../../../modules/ssz/errors";
import { calculateObject } from "../orchestrator";
import { parseCelestialObject } from "../object-input";
import { withinRelative, type SszCheck } from "./outcome";

export const DEFAULT_GOLDEN_CATALOGUE = path.resolve(process.cwd(), "server/data/ssz/golden-catalogue.csv");

export const GOLDEN_EXPECTED_DISTRIBUTION: Readonly<Record<TSszWinner, number>> = Object.freeze({
  SSZ: 46,
  GR: 1,
  TIE: 0,
});

export const GOLDEN_REDSHIFT_TOLERANCE = 1e-9;

/** Read and validate the reference catalogue. Any unreadable or malformed row aborts the load. */
export async function loadGoldenCatalogue(file = DEFAULT_GOLDEN_CATALOGUE): Promise<TSszGoldenRow[]> {
  const resolved = path.resolve(file);
  try {
    await fs.access(resolved);
  } catch {
    throw new GoldenDatasetError(`golden catalogue not found: ${resolved}`, resolved);
  }

  const records: unknown[] = [];
  try {
    await pipeline(
      createReadStream(resolved),
      parse({ columns: true, skip_empty_lines: true, trim: true }),
      async function* (src) {
        for await (const rec of src) {
          records.push(rec);
        }
        yield;
      },
    );
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new GoldenDatasetError(`golden catalogue unreadable: ${message}`, resolved);
  }

  if (!records.length) {
    throw new GoldenDatasetError("golden catalogue has no rows", resolved);
  }
  return records.map((rec, index) => {
    const parsed = SszGoldenRow.safeParse(rec);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new GoldenDatasetError(
        `golden row ${index + 1}: ${issue.path.join(".") || "row"} ${issue.message}`,
        resolved,
      );
    }
    return parsed.data;
  });
}

export const countWinners = (winners: readonly TSszWinner[]): Record<TSszWinner, number> => {
  const counts: Record<TSszWinner, number> = { SSZ: 0, GR: 0, TIE: 0 };
  for (const winner of winners) counts[winner] += 1;
  return counts;
};

export const formatDistribution = (counts: Readonly<Record<TSszWinner, number>>) =>
  `${counts.SSZ} SSZ / ${counts.GR} GR / ${counts.TIE} TIE`;

const category = "golden_regression" as const;

const recompute = (row: TSszGoldenRow, config: TSszRunConfig): SszCalculationResult =>
  calculateObject(
    parseCelestialObject(
      {
        name: row.name,
        mass_Msun: row.mass_Msun,
        radius_m: row.radius_m,
        velocity_mps: row.velocity_mps,
        source: row.source,
        z_obs: row.z_obs,
      },
      config.constants,
    ),
    config,
  );

const rowCheck = (row: TSszGoldenRow, index: number): SszCheck => ({
  id: `golden.row_${String(index + 1).padStart(2, "0")}`,
  category,
  label: `${row.name}: engine reproduces reference redshifts and winner`,
  tolerance: GOLDEN_REDSHIFT_TOLERANCE,
  run: ({ config }) => {
    const result = recompute(row, config);
    const winner = result.observation?.winner ?? "none";
    const problems: string[] = [];
    if (!withinRelative(result.z_ssz_total, row.z_ssz_ref, GOLDEN_REDSHIFT_TOLERANCE)) {
      problems.push(`z_ssz ${result.z_ssz_total} vs ${row.z_ssz_ref}`);
    }
    if (!withinRelative(result.z_grsr, row.z_grsr_ref, GOLDEN_REDSHIFT_TOLERANCE)) {
      problems.push(`z_grsr ${result.z_grsr} vs ${row.z_grsr_ref}`);
    }
    if (winner !== row.winner_ref) {
      problems.push(`winner ${winner} vs ${row.winner_ref}`);
    }
    return {
      pass: problems.length === 0,
      expected: row.winner_ref,
      computed: winner,
      diagnosis: problems.length ? problems.join("; ") : `${result.regime}, ${result.method}`,
    };
  },
});

/** Checks for a loaded catalogue: reference distribution, engine distribution, then one per row. */
export function goldenChecks(rows: readonly TSszGoldenRow[]): SszCheck[] {
  const expected = formatDistribution(GOLDEN_EXPECTED_DISTRIBUTION);
  return [
    {
      id: "golden.reference_distribution",
      category,
      label: "reference winners: 46 SSZ / 1 GR / 0 TIE",
      tolerance: 0,
      run: () => {
        const computed = formatDistribution(countWinners(rows.map((row) => row.winner_ref)));
        return { pass: computed === expected, expected, computed };
      },
    },
    {
      id: "golden.engine_distribution",
      category,
      label: "recomputed winners match the reference distribution",
      tolerance: 0,
      run: ({ config }) => {
        const winners = rows.flatMap((row) => {
          const { observation } = recompute(row, config);
          return observation ? [observation.winner] : [];
        });
        const computed = formatDistribution(countWinners(winners));
        return { pass: computed === expected, expected, computed };
      },
    },
    ...rows.map(rowCheck),
  ];
}
