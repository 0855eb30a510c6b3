/**
 * Marker Dictionary Types: file schema and the in-memory dictionary built from it.
 */
import { z } from "zod";
import type { StainingPattern } from "../shared/types.js";

// ── Dictionary File ──────────────────────────────────────────────────

export const StainingPatternSchema = z.enum(["nuclear", "cytoplasmic", "membranous"]);

export const MarkerRequirementsSchema = z.object({
  percent_required: z.boolean().default(false),
  intensity_required: z.boolean().default(false),
});

export const MarkerDefinitionRecordSchema = z.object({
  marker_canonical: z.string().trim().min(1),
  display_name: z.string().trim().min(1),
  aliases: z.array(z.string().trim().min(1)).min(1),
  hard_pattern_enforce: z.boolean(),
  allowed_patterns: z.array(StainingPatternSchema),
  requirements: MarkerRequirementsSchema.default({}),
});

export const MarkerDictionaryFileSchema = z.object({
  markers: z.array(MarkerDefinitionRecordSchema).min(1),
});

export type MarkerDefinitionRecord = z.input<typeof MarkerDefinitionRecordSchema>;
export type MarkerDictionaryFile = z.input<typeof MarkerDictionaryFileSchema>;

// ── In-memory Dictionary ─────────────────────────────────────────────

export interface MarkerRequirements {
  percentRequired: boolean;
  intensityRequired: boolean;
}

export interface MarkerDefinition {
  readonly canonical: string;
  readonly displayName: string;
  /** Lowercased, whitespace-collapsed alias strings */
  readonly aliases: readonly string[];
  /** Pattern outside `allowedPatterns` is an error rather than a warning */
  readonly hardPatternEnforce: boolean;
  readonly allowedPatterns: readonly StainingPattern[];
  readonly requirements: Readonly<MarkerRequirements>;
}

export interface MarkerDictionary {
  /** Definitions in file order */
  readonly definitions: readonly MarkerDefinition[];
  readonly byCanonical: ReadonlyMap<string, MarkerDefinition>;
  /** Normalized alias → owning definition, in file order */
  readonly aliasIndex: ReadonlyMap<string, MarkerDefinition>;
}
