import { describe, expect, it } from "vitest";
import { DEFAULT_RUN_CONFIG } from "../modules/ssz/run-config";
import { calculateObject } from "../server/services/ssz/orchestrator";
import { parseCelestialObject } from "../server/services/ssz/object-input";
import {
  countWinners,
  formatDistribution,
  GOLDEN_EXPECTED_DISTRIBUTION,
  goldenChecks,
  loadGoldenCatalogue,
} from "../server/services/ssz/validation/golden";

describe("golden catalogue", () => {
  it("loads 47 reference objects", async () => {
    const rows = await loadGoldenCatalogue();
    expect(rows).toHaveLength(47);
    expect(rows[0]).toMatchObject({ name: "SYN-NS-01", mass_Msun: 1.807, source: "surface", winner_ref: "SSZ" });
    expect(new Set(rows.map((row) => row.name)).size).toBe(47);
  });

  it("carries the expected winner distribution", async () => {
    const rows = await loadGoldenCatalogue();
    const counts = countWinners(rows.map((row) => row.winner_ref));
    expect(counts).toEqual({ SSZ: 46, GR: 1, TIE: 0 });
    expect(formatDistribution(counts)).toBe(formatDistribution(GOLDEN_EXPECTED_DISTRIBUTION));
    expect(formatDistribution(counts)).toBe("46 SSZ / 1 GR / 0 TIE");
  });

  it("keeps every reference object out of the weak field", async () => {
    const rows = await loadGoldenCatalogue();
    for (const row of rows) {
      const result = calculateObject(parseCelestialObject(row, DEFAULT_RUN_CONFIG.constants), DEFAULT_RUN_CONFIG);
      expect(result.regime).not.toBe("weak");
      expect(result.z_ssz_total / row.z_ssz_ref).toBeCloseTo(1, 9);
      expect(result.observation?.winner).toBe(row.winner_ref);
    }
  });

  it("uses the geometric hint for orbiting rows", async () => {
    const rows = await loadGoldenCatalogue();
    const orbit = rows.filter((row) => row.source === "orbit");
    expect(orbit.length).toBeGreaterThan(0);
    for (const row of orbit) {
      const result = calculateObject(parseCelestialObject(row, DEFAULT_RUN_CONFIG.constants), DEFAULT_RUN_CONFIG);
      expect(result.method).toBe("geometric_hint");
    }
  });

  it("builds one check per row plus the two distribution checks", async () => {
    const rows = await loadGoldenCatalogue();
    const checks = goldenChecks(rows);
    expect(checks).toHaveLength(49);
    expect(checks.map((check) => check.id).slice(0, 3)).toEqual([
      "golden.reference_distribution",
      "golden.engine_distribution",
      "golden.row_01",
    ]);
  });
});
