import type { MarkerState, RenderedCase, RenderedTableRow } from "../shared/types.js";

export const DEFAULT_SPECIMEN_ID = "Specimen A";

export function renderTableRow(state: MarkerState): RenderedTableRow {
  return {
    marker: state.markerName,
    result: state.result ?? "",
    pattern: state.pattern,
    intensity: state.intensity,
    percent_positive: state.percentPositive,
    extent: state.extent,
    comment: state.comment,
  };
}

/**
 * Narrative line for one marker, e.g. "TTF-1: Positive, nuclear, strong, in 80% of cells."
 * Returns null when the marker has no result.
 */
export function renderNarrativeLine(state: MarkerState): string | null {
  if (state.result === null) return null;

  const pieces: string[] = [state.result];
  if (state.pattern) pieces.push(state.pattern);
  if (state.intensity) pieces.push(state.intensity);
  if (state.percentPositive !== null) {
    pieces.push(`in ${Math.trunc(state.percentPositive)}% of cells`);
  }
  return `${state.markerName}: ${pieces.join(", ")}.`;
}

export function renderCase(
  markers: Iterable<MarkerState>,
  specimenId: string = DEFAULT_SPECIMEN_ID,
): RenderedCase {
  const states = [...markers];
  const table = states.map(renderTableRow);

  if (states.length === 0) {
    return { narrative: null, table };
  }

  const lines = states
    .map(renderNarrativeLine)
    .filter((line): line is string => line !== null);

  return {
    narrative: `Immunohistochemistry (${specimenId}):\n${lines.join("\n")}`,
    table,
  };
}
