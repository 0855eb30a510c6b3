/**
 * Run Configuration Module
 *
 * Resolves engine settings for a run. For every setting a CLI argument takes
 * priority over its environment variable, which takes priority over the default:
 * - specimen id:      --specimen / IHC_SPECIMEN      (default "Specimen A")
 * - dictionary path:  --dict     / IHC_MARKER_DICT   (default: shipped dictionary)
 */

import { DEFAULT_DICTIONARY_PATH } from "../dictionary/loader.js";
import { DEFAULT_SPECIMEN_ID } from "../render/narrative.js";

/** Identifies the rule set in output provenance. */
export const EXTRACTION_MODEL = "rules-v1";
export const ENGINE_VERSION = "1.0.0";

export interface RunConfig {
  specimenId: string;
  dictionaryPath: string;
}

function pick(cliArg: string | undefined, envVar: string | undefined, fallback: string): string {
  const value = (cliArg ?? envVar ?? "").trim();
  return value.length > 0 ? value : fallback;
}

export function parseSpecimenId(cliArg?: string, envVar?: string): string {
  return pick(cliArg, envVar, DEFAULT_SPECIMEN_ID);
}

export function parseDictionaryPath(cliArg?: string, envVar?: string): string {
  return pick(cliArg, envVar, DEFAULT_DICTIONARY_PATH);
}

export function resolveRunConfig(
  cli: { specimen?: string; dict?: string },
  env: NodeJS.ProcessEnv = process.env,
): RunConfig {
  return {
    specimenId: parseSpecimenId(cli.specimen, env.IHC_SPECIMEN),
    dictionaryPath: parseDictionaryPath(cli.dict, env.IHC_MARKER_DICT),
  };
}
