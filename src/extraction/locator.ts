import type { MarkerDefinition, MarkerDictionary } from "../dictionary/types.js";

export interface MarkerMention {
  definition: MarkerDefinition;
  /** Inclusive start offset within the clause */
  start: number;
  /** Exclusive end offset within the clause */
  end: number;
  /** Alias text exactly as written in the clause */
  aliasText: string;
}

/** Word boundaries that treat accented letters and other scripts as word characters */
const WORD_START = "(?<![\\p{L}\\p{N}_])";
const WORD_END = "(?![\\p{L}\\p{N}_])";

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Find marker mentions in a clause. Every alias is matched case-insensitively
 * on word boundaries, any whitespace run standing in for a space. The longest
 * alias at a given start wins, and a match fully contained in an accepted span
 * is dropped.
 */
export function locateMarkers(clause: string, dictionary: MarkerDictionary): MarkerMention[] {
  const candidates: MarkerMention[] = [];

  for (const [alias, definition] of dictionary.aliasIndex) {
    const body = escapeRegExp(alias).replace(/ /g, "\\s+");
    const re = new RegExp(`${WORD_START}${body}${WORD_END}`, "giu");
    for (const m of clause.matchAll(re)) {
      const start = m.index ?? 0;
      const end = start + m[0].length;
      candidates.push({ definition, start, end, aliasText: clause.slice(start, end) });
    }
  }

  // Array.prototype.sort is stable, so ties keep alias discovery order.
  candidates.sort((a, b) => a.start - b.start || (b.end - b.start) - (a.end - a.start));

  const accepted: MarkerMention[] = [];
  for (const candidate of candidates) {
    const contained = accepted.some(
      (a) => candidate.start >= a.start && candidate.end <= a.end,
    );
    if (!contained) accepted.push(candidate);
  }
  return accepted;
}
