/** Polarity of a marker's staining result */
export type MarkerResult = "Positive" | "Negative" | "Not Done";

/** Subcellular staining localisation */
export type StainingPattern = "nuclear" | "cytoplasmic" | "membranous";

export type StainingIntensity = "weak" | "moderate" | "strong";

export type StainingExtent = "focal" | "diffuse";

/** Status of on-slide controls as reported in the text */
export type ControlsStatus = "not mentioned" | "adequate" | "inadequate";

/** Extraction-level confidence; "inferred" is only ever set by the merger */
export type ExtractionConfidence = "explicit" | "uncertain";
export type MarkerConfidence = ExtractionConfidence | "inferred";

/** Validation severity levels */
export type IssueSeverity = "error" | "warning";

/** Overall case outcome */
export type CaseStatus = "ok" | "needs_review" | "failed";

/** Issue codes raised by the merger and the validation rule engine */
export type IssueCode =
  | "DIAGNOSTIC_LANGUAGE_DETECTED"
  | "RESULT_INFERRED"
  | "CONTRADICTORY_RESULT"
  | "LOW_CONFIDENCE"
  | "PERCENT_APPROXIMATE"
  | "UNKNOWN_MARKER"
  | "NO_MARKERS_FOUND"
  | "RESULT_MISSING"
  | "CONTRADICTORY_RESULT_PERCENT"
  | "INVALID_PATTERN"
  | "UNUSUAL_PATTERN"
  | "PERCENT_REQUIRED_MISSING"
  | "INTENSITY_REQUIRED_MISSING"
  | "PERCENT_OUT_OF_RANGE";

/** Marker state field an issue refers to */
export type IssueField =
  | "result"
  | "pattern"
  | "intensity"
  | "percent_positive"
  | "marker_name";

export interface ValidationIssue {
  code: IssueCode;
  message: string;
  severity: IssueSeverity;
  marker_canonical: string | null;
  field: IssueField | null;
}

/** Attributes pulled out of one span of text */
export interface ExtractedAttributes {
  readonly result: MarkerResult | null;
  readonly pattern: StainingPattern | null;
  readonly intensity: StainingIntensity | null;
  readonly extent: StainingExtent | null;
  readonly percent: number | null;
  readonly percentApproximate: boolean;
  readonly controls: ControlsStatus;
  readonly confidence: ExtractionConfidence;
}

/** Traceability record for one processed segment */
export interface EvidenceSpan {
  textSpan: string;
  clauseIndex: number;
  startChar: number;
  endChar: number;
}

/** Running per-marker record, folded across all clauses of a case */
export interface MarkerState {
  markerName: string;
  markerCanonical: string;
  result: MarkerResult | null;
  pattern: StainingPattern | null;
  intensity: StainingIntensity | null;
  percentPositive: number | null;
  percentApproximate: boolean;
  extent: StainingExtent | null;
  controls: ControlsStatus;
  confidence: MarkerConfidence;
  /** Free-text note; extraction never sets one */
  comment: string | null;
  evidence: EvidenceSpan[];
}

/** One row of the rendered results table */
export interface RenderedTableRow {
  marker: string;
  result: string;
  pattern: StainingPattern | null;
  intensity: StainingIntensity | null;
  percent_positive: number | null;
  extent: StainingExtent | null;
  comment: string | null;
}

export interface RenderedCase {
  narrative: string | null;
  table: RenderedTableRow[];
}
