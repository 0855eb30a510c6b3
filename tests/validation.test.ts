import { describe, it, expect } from "vitest";
import { runMarkerValidation, deriveCaseStatus, MARKER_RULES } from "../src/validation/rules.js";
import { createIssueLog, makeIssue } from "../src/validation/issues.js";
import { createMarkerState } from "../src/merge/marker_state.js";
import { loadMarkerDictionary } from "../src/dictionary/loader.js";
import type { MarkerState } from "../src/shared/types.js";

const dict = loadMarkerDictionary();

function state(canonical: string, overrides: Partial<MarkerState> = {}): MarkerState {
  const name = dict.byCanonical.get(canonical)?.displayName ?? canonical;
  return { ...createMarkerState(canonical, name), ...overrides };
}

function validate(...states: MarkerState[]) {
  return runMarkerValidation(new Map(states.map((s): [string, MarkerState] => [s.markerCanonical, s])), dict);
}

function codes(issues: Array<{ code: string }>): string[] {
  return issues.map((i) => i.code);
}

describe("Validation Rule Engine", () => {
  it("passes a complete explicit result", () => {
    const log = validate(state("ER", { result: "Negative" }));
    expect(log.errors).toEqual([]);
    expect(log.warnings).toEqual([]);
  });

  it("errors: result missing", () => {
    const log = validate(state("TTF1"));
    expect(log.errors).toEqual([
      {
        code: "RESULT_MISSING",
        message: "Missing result for TTF1.",
        severity: "error",
        marker_canonical: "TTF1",
        field: "result",
      },
    ]);
  });

  it("errors: negative result with a positive percent", () => {
    const log = validate(state("ER", { result: "Negative", percentPositive: 5 }));
    expect(codes(log.errors)).toEqual(["CONTRADICTORY_RESULT_PERCENT"]);
  });

  it("allows a negative result with zero percent", () => {
    const log = validate(state("ER", { result: "Negative", percentPositive: 0 }));
    expect(log.errors).toEqual([]);
  });

  it("errors: disallowed pattern on a strictly enforced marker", () => {
    const log = validate(state("TTF1", { result: "Positive", pattern: "cytoplasmic" }));
    expect(log.errors).toEqual([
      {
        code: "INVALID_PATTERN",
        message: "Invalid pattern for TTF1: cytoplasmic",
        severity: "error",
        marker_canonical: "TTF1",
        field: "pattern",
      },
    ]);
    expect(log.warnings).toEqual([]);
  });

  it("warns: disallowed pattern on a leniently enforced marker", () => {
    const log = validate(state("CK7", { result: "Positive", pattern: "nuclear" }));
    expect(log.errors).toEqual([]);
    expect(codes(log.warnings)).toEqual(["UNUSUAL_PATTERN"]);
  });

  it("raises exactly one pattern issue for every disallowed pattern", () => {
    for (const def of dict.definitions) {
      for (const pattern of ["nuclear", "cytoplasmic", "membranous"] as const) {
        if (def.allowedPatterns.includes(pattern)) continue;
        const log = validate(state(def.canonical, { result: "Positive", pattern }));
        const patternIssues = [...log.errors, ...log.warnings].filter(
          (i) => i.code === "INVALID_PATTERN" || i.code === "UNUSUAL_PATTERN",
        );
        expect(patternIssues).toHaveLength(1);
        expect(patternIssues[0].code).toBe(def.hardPatternEnforce ? "INVALID_PATTERN" : "UNUSUAL_PATTERN");
      }
    }
  });

  it("errors: required percent absent", () => {
    const log = validate(state("KI67", { result: "Positive" }));
    expect(log.errors).toEqual([
      {
        code: "PERCENT_REQUIRED_MISSING",
        message: "Percent required for KI67.",
        severity: "error",
        marker_canonical: "KI67",
        field: "percent_positive",
      },
    ]);
  });

  it("warns: required percent only approximate", () => {
    const log = validate(state("HER2", { result: "Positive", percentApproximate: true }));
    expect(log.errors).toEqual([]);
    expect(log.warnings).toEqual([
      {
        code: "PERCENT_REQUIRED_MISSING",
        message: "Exact percent required for HER2; approximate provided.",
        severity: "warning",
        marker_canonical: "HER2",
        field: "percent_positive",
      },
    ]);
  });

  it("skips requirement checks for a Not Done result", () => {
    const log = validate(state("PDL1", { result: "Not Done" }));
    expect(log.errors).toEqual([]);
    expect(log.warnings).toEqual([]);
  });

  it("errors: required intensity absent", () => {
    const log = validate(state("PDL1", { result: "Positive", percentPositive: 60 }));
    expect(codes(log.errors)).toEqual(["INTENSITY_REQUIRED_MISSING"]);
  });

  it("errors: percent outside 0-100 without clamping it", () => {
    const s = state("KI67", { result: "Positive", percentPositive: 150 });
    const log = validate(s);
    expect(codes(log.errors)).toEqual(["PERCENT_OUT_OF_RANGE"]);
    expect(s.percentPositive).toBe(150);
  });

  it("evaluates markers in first-seen order and rules in table order", () => {
    const log = validate(
      state("PDL1", { result: "Negative", percentPositive: 150, pattern: "nuclear" }),
      state("TTF1"),
    );
    expect(codes(log.errors)).toEqual([
      "CONTRADICTORY_RESULT_PERCENT",
      "INTENSITY_REQUIRED_MISSING",
      "PERCENT_OUT_OF_RANGE",
      "RESULT_MISSING",
    ]);
    expect(codes(log.warnings)).toEqual(["UNUSUAL_PATTERN"]);
    expect(log.errors.map((i) => i.marker_canonical)).toEqual(["PDL1", "PDL1", "PDL1", "TTF1"]);
  });

  it("appends to an existing issue log", () => {
    const log = createIssueLog();
    log.warnings.push(makeIssue("LOW_CONFIDENCE", "warning", "Uncertain wording for ER.", "ER"));
    runMarkerValidation(new Map([["TTF1", state("TTF1")]]), dict, log);
    expect(codes(log.warnings)).toEqual(["LOW_CONFIDENCE"]);
    expect(codes(log.errors)).toEqual(["RESULT_MISSING"]);
  });

  it("throws for a state with no dictionary definition", () => {
    expect(() => validate(state("CD99", { result: "Positive" }))).toThrow(
      "Marker state CD99 has no dictionary definition",
    );
  });

  it("exposes one rule per check", () => {
    expect(MARKER_RULES.map((r) => r.ruleKey)).toEqual([
      "result_present",
      "negative_without_percent",
      "pattern_allowed",
      "percent_required",
      "intensity_required",
      "percent_in_range",
    ]);
  });
});

describe("deriveCaseStatus", () => {
  const err = makeIssue("RESULT_MISSING", "error", "x");
  const warn = makeIssue("RESULT_INFERRED", "warning", "y");

  it("is failed when any error exists", () => {
    expect(deriveCaseStatus({ errors: [err], warnings: [warn] })).toBe("failed");
  });

  it("is needs_review with only warnings", () => {
    expect(deriveCaseStatus({ errors: [], warnings: [warn] })).toBe("needs_review");
  });

  it("is ok with no issues", () => {
    expect(deriveCaseStatus(createIssueLog())).toBe("ok");
  });
});
