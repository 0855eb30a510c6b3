export { buildMarkerDictionary, loadMarkerDictionary, normalizeAlias, DEFAULT_DICTIONARY_PATH } from "./dictionary/loader.js";
export type { MarkerDefinition, MarkerDictionary, MarkerDictionaryFile } from "./dictionary/types.js";
export { splitClauses } from "./extraction/clauses.js";
export { locateMarkers } from "./extraction/locator.js";
export type { MarkerMention } from "./extraction/locator.js";
export { scopeSegments } from "./extraction/segments.js";
export type { MarkerSegment } from "./extraction/segments.js";
export { extractAttributes, parsePercent } from "./extraction/attributes.js";
export { createMergeAccumulator, mergeClause, mergeClauses, finalizeMerge } from "./merge/marker_state.js";
export type { MergeAccumulator } from "./merge/marker_state.js";
export { MARKER_RULES, runMarkerValidation, deriveCaseStatus } from "./validation/rules.js";
export type { MarkerRule } from "./validation/rules.js";
export { renderCase } from "./render/narrative.js";
export { processCase } from "./engine/process_case.js";
export type { ProcessCaseOptions } from "./engine/process_case.js";
export { runBatch, splitBatch, buildCase } from "./engine/batch.js";
export type { CaseInput, CaseOutput, MarkerRecord } from "./engine/types.js";
export type * from "./shared/types.js";
