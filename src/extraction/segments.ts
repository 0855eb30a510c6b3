import type { MarkerMention } from "./locator.js";

/** Marker-scoped slice of a clause, the direct input to attribute extraction */
export interface MarkerSegment {
  markerCanonical: string;
  markerName: string;
  text: string;
  /** Offsets of the trimmed text within the clause */
  start: number;
  end: number;
}

const TRIM_CHARS = " ,;";

/**
 * Partition a clause into one segment per mention, each running from the
 * mention's start to the next mention's start (or the clause end).
 */
export function scopeSegments(clause: string, mentions: readonly MarkerMention[]): MarkerSegment[] {
  const ordered = [...mentions].sort((a, b) => a.start - b.start);

  return ordered.map((mention, idx) => {
    let start = mention.start;
    let end = idx + 1 < ordered.length ? ordered[idx + 1].start : clause.length;
    while (start < end && TRIM_CHARS.includes(clause[start])) start++;
    while (end > start && TRIM_CHARS.includes(clause[end - 1])) end--;

    return {
      markerCanonical: mention.definition.canonical,
      markerName: mention.definition.displayName,
      text: clause.slice(start, end),
      start,
      end,
    };
  });
}
