import type { MarkerDefinition, MarkerDictionary } from "../dictionary/types.js";
import type { CaseStatus, MarkerState, ValidationIssue } from "../shared/types.js";
import { createIssueLog, makeIssue, recordIssue } from "./issues.js";
import type { IssueLog } from "./issues.js";

/**
 * A per-marker validation rule. Returns the issue it raises, or null.
 */
export interface MarkerRule {
  ruleKey: string;
  evaluate(state: MarkerState, definition: MarkerDefinition): ValidationIssue | null;
}

// ── Marker Rules (evaluated in this order) ───────────────────────────

export const MARKER_RULES: readonly MarkerRule[] = [
  {
    ruleKey: "result_present",
    evaluate: (s) =>
      s.result === null
        ? makeIssue("RESULT_MISSING", "error", `Missing result for ${s.markerCanonical}.`, s.markerCanonical, "result")
        : null,
  },
  {
    ruleKey: "negative_without_percent",
    evaluate: (s) =>
      s.result === "Negative" && s.percentPositive !== null && s.percentPositive > 0
        ? makeIssue(
            "CONTRADICTORY_RESULT_PERCENT",
            "error",
            `Negative result with non-zero percent for ${s.markerCanonical}.`,
            s.markerCanonical,
            "percent_positive",
          )
        : null,
  },
  {
    ruleKey: "pattern_allowed",
    evaluate: (s, def) => {
      if (s.pattern === null || def.allowedPatterns.includes(s.pattern)) return null;
      return def.hardPatternEnforce
        ? makeIssue("INVALID_PATTERN", "error", `Invalid pattern for ${s.markerCanonical}: ${s.pattern}`, s.markerCanonical, "pattern")
        : makeIssue("UNUSUAL_PATTERN", "warning", `Unusual pattern for ${s.markerCanonical}: ${s.pattern}`, s.markerCanonical, "pattern");
    },
  },
  {
    ruleKey: "percent_required",
    evaluate: (s, def) => {
      if (!def.requirements.percentRequired || s.result === "Not Done" || s.percentPositive !== null) {
        return null;
      }
      // An approximate reading is present but imprecise, not absent.
      return s.percentApproximate
        ? makeIssue(
            "PERCENT_REQUIRED_MISSING",
            "warning",
            `Exact percent required for ${s.markerCanonical}; approximate provided.`,
            s.markerCanonical,
            "percent_positive",
          )
        : makeIssue(
            "PERCENT_REQUIRED_MISSING",
            "error",
            `Percent required for ${s.markerCanonical}.`,
            s.markerCanonical,
            "percent_positive",
          );
    },
  },
  {
    ruleKey: "intensity_required",
    evaluate: (s, def) =>
      def.requirements.intensityRequired && s.result !== "Not Done" && s.intensity === null
        ? makeIssue(
            "INTENSITY_REQUIRED_MISSING",
            "error",
            `Intensity required for ${s.markerCanonical}.`,
            s.markerCanonical,
            "intensity",
          )
        : null,
  },
  {
    ruleKey: "percent_in_range",
    evaluate: (s) =>
      s.percentPositive !== null && (s.percentPositive < 0 || s.percentPositive > 100)
        ? makeIssue(
            "PERCENT_OUT_OF_RANGE",
            "error",
            `Percent out of range for ${s.markerCanonical}.`,
            s.markerCanonical,
            "percent_positive",
          )
        : null,
  },
];

/**
 * Run every marker rule over the merged states in first-seen order,
 * appending to `log` (a fresh log when omitted).
 */
export function runMarkerValidation(
  markers: ReadonlyMap<string, MarkerState>,
  dictionary: MarkerDictionary,
  log: IssueLog = createIssueLog(),
  rules: readonly MarkerRule[] = MARKER_RULES,
): IssueLog {
  for (const [canonical, state] of markers) {
    const definition = dictionary.byCanonical.get(canonical);
    if (!definition) {
      throw new Error(`Marker state ${canonical} has no dictionary definition`);
    }
    for (const rule of rules) {
      const issue = rule.evaluate(state, definition);
      if (issue) recordIssue(log, issue);
    }
  }
  return log;
}

/** failed if any error, needs_review if any warning, else ok. */
export function deriveCaseStatus(log: IssueLog): CaseStatus {
  if (log.errors.length > 0) return "failed";
  if (log.warnings.length > 0) return "needs_review";
  return "ok";
}
