/**
 * Case Record Types: the input contract produced by the batch layer and the
 * output record written back out.
 */
import { z } from "zod";
import type {
  CaseStatus,
  ControlsStatus,
  MarkerConfidence,
  MarkerResult,
  RenderedCase,
  StainingExtent,
  StainingIntensity,
  StainingPattern,
  ValidationIssue,
} from "../shared/types.js";

// ── Case Input ───────────────────────────────────────────────────────

export const CaseContextSchema = z.object({
  case_id: z.string().nullable().default(null),
  specimen_id: z.string().nullable().default(null),
  panel_hint: z.string().nullable().default(null),
});

export const CaseInputSchema = z.object({
  input_id: z.string().min(1),
  input_type: z.string().min(1),
  raw_text: z.string(),
  context: CaseContextSchema.default({}),
});

export type CaseInput = z.input<typeof CaseInputSchema>;
export type ParsedCaseInput = z.output<typeof CaseInputSchema>;

// ── Case Output ──────────────────────────────────────────────────────

export interface EvidenceRecord {
  text_span: string;
  clause_index: number;
  start_char: number;
  end_char: number;
}

export interface MarkerRecord {
  marker_name: string;
  marker_canonical: string;
  result: MarkerResult | null;
  pattern: StainingPattern | null;
  intensity: StainingIntensity | null;
  percent_positive: number | null;
  percent_approximate: boolean;
  extent: StainingExtent | null;
  controls: ControlsStatus;
  confidence: MarkerConfidence;
  comment: string | null;
  evidence: EvidenceRecord[];
}

export interface CaseOutput {
  output_id: string;
  input_id: string;
  status: CaseStatus;
  ihc: {
    panel_name: string | null;
    case_id: string | null;
    specimen_id: string | null;
    markers: MarkerRecord[];
  };
  rendered: RenderedCase;
  validation: {
    errors: ValidationIssue[];
    warnings: ValidationIssue[];
  };
  provenance: {
    source_type: string;
    extraction_model: string;
    version: string;
  };
}
