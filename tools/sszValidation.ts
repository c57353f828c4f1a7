import type { TSszValidationReport } from "@shared/ssz";
import { resolveGoldenPath, resolveRunConfigFromEnv } from "../server/config/env";
import { describeRunConfig, createRunConfig, type RunConfigOverrides } from "../modules/ssz/run-config";
import { formatValidationReport, runValidationSuite } from "../server/services/ssz/validation/harness";

export type SszValidationParams = {
  overrides?: RunConfigOverrides;
  goldenPath?: string;
  env?: Record<string, string | undefined>;
};

export interface SszValidationRun {
  header: string;
  report: TSszValidationReport;
  text: string;
  ok: boolean;
}

/**
 * Run the harness with explicit overrides, or with the SSZ_* environment when
 * none are given.
 */
export async function runSszValidation(params: SszValidationParams = {}): Promise<SszValidationRun> {
  const env = params.env ?? process.env;
  const config = params.overrides ? createRunConfig(params.overrides) : resolveRunConfigFromEnv(env);
  const report = await runValidationSuite({
    config,
    goldenPath: params.goldenPath ?? resolveGoldenPath(env),
  });
  return {
    header: describeRunConfig(config),
    report,
    text: formatValidationReport(report),
    ok: report.summary.failed === 0,
  };
}
