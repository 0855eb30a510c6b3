/**
 * Marker State Merger
 *
 * Folds per-segment attributes into one running MarkerState per canonical
 * marker. A case is merged as:
 *
 *   clauses.reduce((acc, clause, i) => mergeClause(acc, clause, i, dict), createMergeAccumulator())
 *
 * Conflict rules:
 * - result: last non-null value wins; a change raises CONTRADICTORY_RESULT.
 * - pattern / intensity / extent / percent: last non-null value wins, per field.
 * - controls / confidence: only a non-default value overwrites.
 * - percentApproximate: sticky once set.
 */

import type { MarkerDictionary } from "../dictionary/types.js";
import type { ExtractedAttributes, MarkerResult, MarkerState } from "../shared/types.js";
import { extractAttributes } from "../extraction/attributes.js";
import { locateMarkers } from "../extraction/locator.js";
import { scopeSegments } from "../extraction/segments.js";
import type { MarkerSegment } from "../extraction/segments.js";
import { createIssueLog, makeIssue, recordIssue } from "../validation/issues.js";
import type { IssueLog } from "../validation/issues.js";

export interface MergeAccumulator extends IssueLog {
  /** Insertion order is first-seen order */
  markers: Map<string, MarkerState>;
}

const NEGATIVE_FOR = /\bnegative\s+for\b/i;
const UNKNOWN_MARKER_SHAPE =
  /(?<![\p{L}\p{N}_])([A-Za-z]{2,}\d*)\s+(?:positive|negative)(?![\p{L}\p{N}_])/gu;
/** Tokens this short are usually lab shorthand rather than marker names */
const MIN_UNKNOWN_TOKEN_LENGTH = 3;

export function createMergeAccumulator(): MergeAccumulator {
  return { markers: new Map<string, MarkerState>(), ...createIssueLog() };
}

export function createMarkerState(markerCanonical: string, markerName: string): MarkerState {
  return {
    markerName,
    markerCanonical,
    result: null,
    pattern: null,
    intensity: null,
    percentPositive: null,
    percentApproximate: false,
    extent: null,
    controls: "not mentioned",
    confidence: "explicit",
    comment: null,
    evidence: [],
  };
}

function hasSupportingAttributes(attrs: ExtractedAttributes): boolean {
  return (
    attrs.intensity !== null ||
    attrs.pattern !== null ||
    attrs.percent !== null ||
    attrs.percentApproximate ||
    attrs.extent !== null
  );
}

/**
 * Resolve a segment's result from its own text, then the clause-level
 * result, then a clause-wide "negative for".
 */
export function resolveSegmentResult(
  segmentAttrs: ExtractedAttributes,
  clauseAttrs: ExtractedAttributes,
  negativeForClause: boolean,
): MarkerResult | null {
  if (segmentAttrs.result !== null) return segmentAttrs.result;
  if (clauseAttrs.result !== null) return clauseAttrs.result;
  if (negativeForClause) return "Negative";
  return null;
}

/**
 * Apply one segment's attributes to the accumulator.
 */
export function applySegment(
  acc: MergeAccumulator,
  segment: MarkerSegment,
  attrs: ExtractedAttributes,
  result: MarkerResult | null,
  clauseIndex: number,
): void {
  const can = segment.markerCanonical;

  let state = acc.markers.get(can);
  if (!state) {
    state = createMarkerState(can, segment.markerName);
    acc.markers.set(can, state);
  }

  let newResult = result;
  if (newResult === null && hasSupportingAttributes(attrs)) {
    newResult = "Positive";
    state.confidence = "inferred";
    recordIssue(
      acc,
      makeIssue("RESULT_INFERRED", "warning", `Result inferred from attributes for ${can}.`, can, "result"),
    );
  }

  if (newResult !== null) {
    if (state.result !== null && state.result !== newResult) {
      recordIssue(
        acc,
        makeIssue("CONTRADICTORY_RESULT", "error", `Conflicting results for ${can}.`, can, "result"),
      );
    }
    state.result = newResult;
  }

  if (attrs.pattern !== null) state.pattern = attrs.pattern;
  if (attrs.intensity !== null) state.intensity = attrs.intensity;
  if (attrs.extent !== null) state.extent = attrs.extent;
  if (attrs.percent !== null) state.percentPositive = attrs.percent;

  if (attrs.controls !== "not mentioned") state.controls = attrs.controls;

  if (attrs.confidence !== "explicit") {
    state.confidence = "uncertain";
    recordIssue(acc, makeIssue("LOW_CONFIDENCE", "warning", `Uncertain wording for ${can}.`, can));
  }

  if (attrs.percentApproximate) {
    state.percentApproximate = true;
    recordIssue(
      acc,
      makeIssue(
        "PERCENT_APPROXIMATE",
        "warning",
        `Approximate/range percent for ${can}.`,
        can,
        "percent_positive",
      ),
    );
  }

  state.evidence.push({
    textSpan: segment.text,
    clauseIndex,
    startChar: segment.start,
    endChar: segment.end,
  });
}

/**
 * Scan a clause with no known marker for "TOKEN positive|negative" shapes.
 */
export function findUnknownMarkers(clause: string): string[] {
  const tokens: string[] = [];
  for (const m of clause.matchAll(UNKNOWN_MARKER_SHAPE)) {
    if (m[1].length >= MIN_UNKNOWN_TOKEN_LENGTH) tokens.push(m[1]);
  }
  return tokens;
}

/**
 * Merge one clause into the accumulator and return it.
 */
export function mergeClause(
  acc: MergeAccumulator,
  clause: string,
  clauseIndex: number,
  dictionary: MarkerDictionary,
): MergeAccumulator {
  const mentions = locateMarkers(clause, dictionary);

  if (mentions.length === 0) {
    for (const token of findUnknownMarkers(clause)) {
      recordIssue(
        acc,
        makeIssue("UNKNOWN_MARKER", "error", `Unknown marker: ${token}`, null, "marker_name"),
      );
    }
    return acc;
  }

  const clauseAttrs = extractAttributes(clause);
  const negativeForClause = NEGATIVE_FOR.test(clause);

  for (const segment of scopeSegments(clause, mentions)) {
    const attrs = extractAttributes(segment.text);
    const result = resolveSegmentResult(attrs, clauseAttrs, negativeForClause);
    applySegment(acc, segment, attrs, result, clauseIndex);
  }

  return acc;
}

/**
 * Close the fold: a case without any marker state gets NO_MARKERS_FOUND.
 */
export function finalizeMerge(acc: MergeAccumulator): MergeAccumulator {
  if (acc.markers.size === 0) {
    recordIssue(acc, makeIssue("NO_MARKERS_FOUND", "error", "No known markers found."));
  }
  return acc;
}

export function mergeClauses(
  clauses: readonly string[],
  dictionary: MarkerDictionary,
  initial: MergeAccumulator = createMergeAccumulator(),
): MergeAccumulator {
  const acc = clauses.reduce(
    (current, clause, idx) => mergeClause(current, clause, idx, dictionary),
    initial,
  );
  return finalizeMerge(acc);
}
