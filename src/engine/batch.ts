import type { MarkerDictionary } from "../dictionary/types.js";
import { processCase } from "./process_case.js";
import type { ProcessCaseOptions } from "./process_case.js";
import type { CaseInput, CaseOutput } from "./types.js";

/**
 * Split a batch text into case paragraphs on blank lines.
 */
export function splitBatch(text: string): string[] {
  return text
    .trim()
    .split(/\n[ \t]*\r?\n/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

export function caseInputId(index: number): string {
  return `case-${String(index).padStart(2, "0")}`;
}

export function buildCase(inputId: string, rawText: string, specimenId: string | null): CaseInput {
  return {
    input_id: inputId,
    input_type: "text",
    raw_text: rawText,
    context: {
      case_id: null,
      specimen_id: specimenId,
      panel_hint: null,
    },
  };
}

/**
 * Process every paragraph of a batch as an independent case, in order.
 */
export function runBatch(
  text: string,
  dictionary: MarkerDictionary,
  specimenId: string | null,
  options: ProcessCaseOptions = {},
): CaseOutput[] {
  return splitBatch(text).map((paragraph, idx) =>
    processCase(buildCase(caseInputId(idx + 1), paragraph, specimenId), dictionary, options),
  );
}
