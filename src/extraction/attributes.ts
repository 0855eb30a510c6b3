/**
 * Attribute Extractor
 *
 * Rule-based parser turning a span of IHC text into ExtractedAttributes.
 * Each field is driven by its own table so new clinical vocabulary can be
 * added here without touching the merger or the validation rules. No rule
 * ever throws; a field with no hit keeps its null/default value.
 */

import type {
  ControlsStatus,
  ExtractedAttributes,
  ExtractionConfidence,
  MarkerResult,
  StainingExtent,
  StainingIntensity,
  StainingPattern,
} from "../shared/types.js";

/** Ordered rule: the first rule whose pattern matches supplies the value. */
export interface FieldRule<T> {
  pattern: RegExp;
  value: T;
}

// ── Rule Tables ──────────────────────────────────────────────────────

export const RESULT_RULES: readonly FieldRule<MarkerResult>[] = [
  { pattern: /\b(not\s+done|awaited|pending)\b/i, value: "Not Done" },
  { pattern: /\b(positive|positivity)\b/i, value: "Positive" },
  { pattern: /\bnegative\b/i, value: "Negative" },
];

/** Keyword → value; whichever keyword appears first in the text wins. */
export const PATTERN_VOCABULARY: Readonly<Record<string, StainingPattern>> = {
  nuclear: "nuclear",
  cytoplasmic: "cytoplasmic",
  membranous: "membranous",
};

export const INTENSITY_VOCABULARY: Readonly<Record<string, StainingIntensity>> = {
  weak: "weak",
  moderate: "moderate",
  strong: "strong",
};

export const EXTENT_VOCABULARY: Readonly<Record<string, StainingExtent>> = {
  focal: "focal",
  diffuse: "diffuse",
};

const CONTROLS_MENTION = /\b(control|controls|internal control)\b/i;

export const CONTROLS_RULES: readonly FieldRule<ControlsStatus>[] = [
  { pattern: /inadequate/i, value: "inadequate" },
  { pattern: /\b(adequate|fine)\b/i, value: "adequate" },
];

export const CONFIDENCE_RULES: readonly FieldRule<ExtractionConfidence>[] = [
  { pattern: /\b(maybe|kind of|around)\b/i, value: "uncertain" },
];

export const NUMBER_WORDS: ReadonlyMap<string, number> = new Map([
  ["zero", 0],
  ["ten", 10],
  ["twenty", 20],
  ["thirty", 30],
  ["forty", 40],
  ["fifty", 50],
  ["sixty", 60],
  ["seventy", 70],
  ["eighty", 80],
  ["ninety", 90],
  ["hundred", 100],
]);

const PERCENT_RANGE = /\b(\w+)\s+to\s+(\w+)\s+percent\b/i;
const PERCENT_EXACT = /\b(\d{1,3})\s*(?:%|percent\b)/i;
const PERCENT_WORD = /\b(\w+)\s+percent\b/i;

// ── Evaluators ───────────────────────────────────────────────────────

function firstRule<T>(text: string, rules: readonly FieldRule<T>[]): T | null {
  for (const rule of rules) {
    if (rule.pattern.test(text)) return rule.value;
  }
  return null;
}

function earliestKeyword<T>(text: string, vocabulary: Readonly<Record<string, T>>): T | null {
  const alternatives = Object.keys(vocabulary).join("|");
  const m = new RegExp(`\\b(${alternatives})\\b`, "i").exec(text);
  if (!m) return null;
  return vocabulary[m[1].toLowerCase()] ?? null;
}

export interface PercentReading {
  percent: number | null;
  approximate: boolean;
}

/**
 * Read percent positivity. A range ("10 to 20 percent") is approximate and
 * yields no value; otherwise a literal number, then a spelled-out number.
 */
export function parsePercent(text: string): PercentReading {
  if (PERCENT_RANGE.test(text)) {
    return { percent: null, approximate: true };
  }

  const exact = PERCENT_EXACT.exec(text);
  if (exact) {
    return { percent: Number(exact[1]), approximate: false };
  }

  const word = PERCENT_WORD.exec(text);
  if (word) {
    const value = NUMBER_WORDS.get(word[1].toLowerCase());
    if (value !== undefined) {
      return { percent: value, approximate: false };
    }
  }

  return { percent: null, approximate: false };
}

export function extractAttributes(text: string): ExtractedAttributes {
  const { percent, approximate } = parsePercent(text);

  let controls: ControlsStatus = "not mentioned";
  if (CONTROLS_MENTION.test(text)) {
    controls = firstRule(text, CONTROLS_RULES) ?? "not mentioned";
  }

  return {
    result: firstRule(text, RESULT_RULES),
    pattern: earliestKeyword(text, PATTERN_VOCABULARY),
    intensity: earliestKeyword(text, INTENSITY_VOCABULARY),
    extent: earliestKeyword(text, EXTENT_VOCABULARY),
    percent,
    percentApproximate: approximate,
    controls,
    confidence: firstRule(text, CONFIDENCE_RULES) ?? "explicit",
  };
}
