import type { TSszRunConfig, TSszValidationCategory, TSszValidationOutcome } from "@shared/ssz";

export type SszCheckValue = number | string | boolean;

export type SszCheckResult = {
  pass: boolean;
  expected: SszCheckValue;
  computed: SszCheckValue;
  diagnosis?: string;
};

export type SszCheckContext = {
  config: TSszRunConfig;
};

export type SszCheck = {
  id: string;
  category: TSszValidationCategory;
  label: string;
  tolerance: number;
  run: (ctx: SszCheckContext) => SszCheckResult;
};

// Report values must survive JSON: non-finite numbers and booleans become strings.
export const toReportValue = (value: SszCheckValue): number | string => {
  if (typeof value === "boolean") return String(value);
  if (typeof value === "number" && !Number.isFinite(value)) return String(value);
  return value;
};

export const relativeError = (computed: number, expected: number): number => {
  if (expected === 0) return Math.abs(computed);
  return Math.abs(computed - expected) / Math.abs(expected);
};

export const withinRelative = (computed: number, expected: number, tolerance: number): boolean =>
  Number.isFinite(computed) && relativeError(computed, expected) <= tolerance;

export const withinAbsolute = (computed: number, expected: number, tolerance: number): boolean =>
  Number.isFinite(computed) && Math.abs(computed - expected) <= tolerance;

/** Relative comparison of a computed value against a reference, with a stock diagnosis. */
export function compareRelative(computed: number, expected: number, tolerance: number): SszCheckResult {
  const pass = withinRelative(computed, expected, tolerance);
  return {
    pass,
    expected,
    computed,
    diagnosis: pass ? "" : `relative error ${relativeError(computed, expected).toExponential(3)} exceeds ${tolerance}`,
  };
}

export function compareAbsolute(computed: number, expected: number, tolerance: number): SszCheckResult {
  const pass = withinAbsolute(computed, expected, tolerance);
  return {
    pass,
    expected,
    computed,
    diagnosis: pass ? "" : `absolute error ${Math.abs(computed - expected).toExponential(3)} exceeds ${tolerance}`,
  };
}

/**
 * Run one check. A check that throws is recorded as a failure carrying the
 * error message; it never aborts the suite.
 */
export function runCheck(check: SszCheck, ctx: SszCheckContext): TSszValidationOutcome {
  const base = {
    id: check.id,
    category: check.category,
    label: check.label,
    tolerance: check.tolerance,
  };
  try {
    const result = check.run(ctx);
    return {
      ...base,
      status: result.pass ? "pass" : "fail",
      expected: toReportValue(result.expected),
      computed: toReportValue(result.computed),
      diagnosis: result.diagnosis ?? "",
    };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.warn(`[ssz-validation] check ${check.id} threw: ${message}`);
    return {
      ...base,
      status: "fail",
      expected: "no error",
      computed: "error",
      diagnosis: message,
    };
  }
}
