/**
 * Marker Dictionary Loader: validates a dictionary file and builds the
 * immutable lookup structures the engine consumes.
 */

import { readFileSync, existsSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";

import { MarkerDictionaryFileSchema } from "./types.js";
import type { MarkerDefinition, MarkerDictionary } from "./types.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Dictionary shipped with the engine. */
export const DEFAULT_DICTIONARY_PATH = path.join(__dirname, "marker_dict.json");

/** Lowercase, trim and collapse internal whitespace. */
export function normalizeAlias(alias: string): string {
  return alias.trim().toLowerCase().replace(/\s+/g, " ");
}

/**
 * Build a dictionary from parsed JSON. Throws on schema violations,
 * duplicate canonical ids, and aliases claimed by more than one marker.
 */
export function buildMarkerDictionary(raw: unknown): MarkerDictionary {
  const file = MarkerDictionaryFileSchema.parse(raw);

  const definitions: MarkerDefinition[] = [];
  const byCanonical = new Map<string, MarkerDefinition>();
  const aliasIndex = new Map<string, MarkerDefinition>();

  for (const record of file.markers) {
    if (byCanonical.has(record.marker_canonical)) {
      throw new Error(`Duplicate marker_canonical in dictionary: ${record.marker_canonical}`);
    }

    const aliases = [...new Set(record.aliases.map(normalizeAlias))];
    const definition: MarkerDefinition = Object.freeze({
      canonical: record.marker_canonical,
      displayName: record.display_name,
      aliases: Object.freeze(aliases),
      hardPatternEnforce: record.hard_pattern_enforce,
      allowedPatterns: Object.freeze([...record.allowed_patterns]),
      requirements: Object.freeze({
        percentRequired: record.requirements.percent_required,
        intensityRequired: record.requirements.intensity_required,
      }),
    });

    for (const alias of aliases) {
      const owner = aliasIndex.get(alias);
      if (owner) {
        throw new Error(
          `Alias "${alias}" is claimed by both ${owner.canonical} and ${definition.canonical}`,
        );
      }
      aliasIndex.set(alias, definition);
    }

    definitions.push(definition);
    byCanonical.set(definition.canonical, definition);
  }

  return Object.freeze({
    definitions: Object.freeze(definitions),
    byCanonical,
    aliasIndex,
  });
}

/**
 * Read and build a dictionary from a JSON file.
 */
export function loadMarkerDictionary(filePath: string = DEFAULT_DICTIONARY_PATH): MarkerDictionary {
  if (!existsSync(filePath)) {
    throw new Error(`Marker dictionary not found: ${filePath}`);
  }
  const raw: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
  return buildMarkerDictionary(raw);
}
