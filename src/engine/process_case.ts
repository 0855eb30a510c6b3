/**
 * Case Processor. Runs one case through the full pipeline:
 *
 *   raw text → clauses → {locate → scope → extract} per clause → merge
 *            → validate → render → CaseOutput
 *
 * Clinical-text problems surface as validation issues. A malformed case
 * record or an inconsistent dictionary throws.
 */

import { v4 as uuidv4 } from "uuid";

import type { MarkerDictionary } from "../dictionary/types.js";
import type { MarkerState } from "../shared/types.js";
import { ENGINE_VERSION, EXTRACTION_MODEL } from "../shared/run_config.js";
import { splitClauses } from "../extraction/clauses.js";
import { createMergeAccumulator, mergeClauses } from "../merge/marker_state.js";
import { makeIssue, recordIssue } from "../validation/issues.js";
import { deriveCaseStatus, runMarkerValidation } from "../validation/rules.js";
import { DEFAULT_SPECIMEN_ID, renderCase } from "../render/narrative.js";
import { CaseInputSchema } from "./types.js";
import type { CaseInput, CaseOutput, MarkerRecord } from "./types.js";

const DIAGNOSTIC_LANGUAGE =
  /\b(supports?|consistent with|suggestive of|favor|favours?|primary|metastasis|metastatic)\b/i;

export interface ProcessCaseOptions {
  /** Used for the narrative header when the case context names no specimen */
  defaultSpecimenId?: string;
}

export function toMarkerRecord(state: MarkerState): MarkerRecord {
  return {
    marker_name: state.markerName,
    marker_canonical: state.markerCanonical,
    result: state.result,
    pattern: state.pattern,
    intensity: state.intensity,
    percent_positive: state.percentPositive,
    percent_approximate: state.percentApproximate,
    extent: state.extent,
    controls: state.controls,
    confidence: state.confidence,
    comment: state.comment,
    evidence: state.evidence.map((e) => ({
      text_span: e.textSpan,
      clause_index: e.clauseIndex,
      start_char: e.startChar,
      end_char: e.endChar,
    })),
  };
}

export function processCase(
  input: CaseInput,
  dictionary: MarkerDictionary,
  options: ProcessCaseOptions = {},
): CaseOutput {
  const record = CaseInputSchema.parse(input);
  const raw = record.raw_text.trim();

  const acc = createMergeAccumulator();
  if (DIAGNOSTIC_LANGUAGE.test(raw)) {
    recordIssue(
      acc,
      makeIssue("DIAGNOSTIC_LANGUAGE_DETECTED", "warning", "Diagnostic language found in input."),
    );
  }

  mergeClauses(splitClauses(raw), dictionary, acc);
  runMarkerValidation(acc.markers, dictionary, acc);

  const specimen =
    record.context.specimen_id || options.defaultSpecimenId || DEFAULT_SPECIMEN_ID;
  const states = [...acc.markers.values()];

  return {
    output_id: uuidv4(),
    input_id: record.input_id,
    status: deriveCaseStatus(acc),
    ihc: {
      panel_name: record.context.panel_hint,
      case_id: record.context.case_id,
      specimen_id: record.context.specimen_id,
      markers: states.map(toMarkerRecord),
    },
    rendered: renderCase(states, specimen),
    validation: { errors: acc.errors, warnings: acc.warnings },
    provenance: {
      source_type: record.input_type,
      extraction_model: EXTRACTION_MODEL,
      version: ENGINE_VERSION,
    },
  };
}
