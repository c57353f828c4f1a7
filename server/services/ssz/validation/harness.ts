import {
  SszValidationCategory,
  SszValidationReport,
  type TSszCategorySummary,
  type TSszRunConfig,
  type TSszValidationCategory,
  type TSszValidationOutcome,
  type TSszValidationReport,
} from "@shared/ssz";
import { coreFormulaChecks } from "./core-formula";
import { experimentalChecks } from "./experimental";
import { DEFAULT_GOLDEN_CATALOGUE, goldenChecks, loadGoldenCatalogue } from "./golden";
import { numericalPrecisionChecks } from "./numerical-precision";
import { runCheck, type SszCheck } from "./outcome";
import { physicalLimitChecks } from "./physical-limits";
import { regimeContinuityChecks } from "./regime-continuity";

export const BUILTIN_CHECKS: readonly SszCheck[] = [
  ...coreFormulaChecks,
  ...physicalLimitChecks,
  ...numericalPrecisionChecks,
  ...regimeContinuityChecks,
  ...experimentalChecks,
];

export type ValidationSuiteOptions = {
  config: TSszRunConfig;
  goldenPath?: string;
  checks?: readonly SszCheck[];
  now?: () => Date;
};

const summarize = (outcomes: readonly TSszValidationOutcome[]): TSszValidationReport["summary"] => {
  const categories = Object.fromEntries(
    SszValidationCategory.options.map((category): [TSszValidationCategory, TSszCategorySummary] => [
      category,
      { total: 0, passed: 0, failed: 0 },
    ]),
  );
  let passed = 0;
  for (const outcome of outcomes) {
    const bucket = categories[outcome.category];
    bucket.total += 1;
    if (outcome.status === "pass") {
      bucket.passed += 1;
      passed += 1;
    } else {
      bucket.failed += 1;
    }
  }
  const total = outcomes.length;
  return {
    total,
    passed,
    failed: total - passed,
    pass_rate: total ? (100 * passed) / total : 0,
    categories,
  };
};

/**
 * Run every check and the golden regression. Individual failures are
 * recorded; only a missing or malformed golden catalogue rejects.
 */
export async function runValidationSuite(options: ValidationSuiteOptions): Promise<TSszValidationReport> {
  const { config } = options;
  const now = options.now ?? (() => new Date());
  const golden = await loadGoldenCatalogue(options.goldenPath ?? DEFAULT_GOLDEN_CATALOGUE);
  const checks = [...(options.checks ?? BUILTIN_CHECKS), ...goldenChecks(golden)];
  const outcomes = checks.map((check) => runCheck(check, { config }));
  return SszValidationReport.parse({
    schema_version: "ssz_validation_report/1",
    kind: "ssz_validation_report",
    generated_at_iso: now().toISOString(),
    run_id: config.runId,
    outcomes,
    summary: summarize(outcomes),
  });
}

const fmtValue = (value: number | string): string => {
  if (typeof value === "string") return value;
  if (value !== 0 && (Math.abs(value) >= 1e4 || Math.abs(value) < 1e-3)) return value.toExponential(4);
  return value.toFixed(4);
};

/** Plain-text report: one line per check, grouped by category, then the totals. */
export function formatValidationReport(report: TSszValidationReport, opts: { failuresOnly?: boolean } = {}): string {
  const lines: string[] = [`=== SSZ validation (${report.run_id}) ===`];
  for (const category of SszValidationCategory.options) {
    const stats = report.summary.categories[category];
    if (!stats || stats.total === 0) continue;
    lines.push("", `[${category}] ${stats.passed}/${stats.total} passed`);
    for (const outcome of report.outcomes) {
      if (outcome.category !== category) continue;
      if (opts.failuresOnly && outcome.status === "pass") continue;
      const mark = outcome.status === "pass" ? "PASS" : "FAIL";
      const detail = outcome.diagnosis ? ` (${outcome.diagnosis})` : "";
      lines.push(
        `  ${mark} ${outcome.id}: ${outcome.label} | expected ${fmtValue(outcome.expected)}, got ${fmtValue(outcome.computed)}${detail}`,
      );
    }
  }
  const { total, passed, failed, pass_rate } = report.summary;
  lines.push("", `Total: ${passed}/${total} passed, ${failed} failed (${pass_rate.toFixed(1)}%)`);
  return lines.join("\n");
}
