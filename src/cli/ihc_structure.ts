#!/usr/bin/env tsx
/**
 * CLI: ihc:structure
 *
 * Usage: npm run ihc:structure -- --batch <file> [--specimen <id>] [--output <file>] [--dict <file>]
 *
 * Reads a batch text file (blank lines separate cases), structures each case
 * and writes the JSON array of case outputs.
 */

import { readFileSync, writeFileSync, existsSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";

import { loadMarkerDictionary } from "../dictionary/loader.js";
import { runBatch } from "../engine/batch.js";
import { resolveRunConfig } from "../shared/run_config.js";

export interface CliArgs {
  batch: string;
  specimen?: string;
  output: string;
  dict?: string;
}

const DEFAULT_OUTPUT = "ihc_outputs.json";

/**
 * Parse flags; returns null when the required --batch flag is missing.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs | null {
  const flags: Record<string, string> = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith("--") && i + 1 < argv.length) {
      flags[arg.slice(2)] = argv[i + 1];
      i++;
    }
  }

  if (!flags.batch) return null;
  return {
    batch: flags.batch,
    specimen: flags.specimen,
    output: flags.output ?? DEFAULT_OUTPUT,
    dict: flags.dict,
  };
}

function main() {
  const args = parseCliArgs(process.argv.slice(2));
  if (!args) {
    console.error(
      "Usage: npm run ihc:structure -- --batch <file> [--specimen <id>] [--output <file>] [--dict <file>]",
    );
    process.exit(1);
  }

  const config = resolveRunConfig({ specimen: args.specimen, dict: args.dict });
  const batchPath = path.resolve(args.batch);
  const outputPath = path.resolve(args.output);

  console.log("IHC Structuring Engine");
  console.log();
  console.log(`  Batch:      ${batchPath}`);
  console.log(`  Specimen:   ${config.specimenId}`);
  console.log(`  Dictionary: ${config.dictionaryPath}`);
  console.log();

  try {
    if (!existsSync(batchPath)) {
      throw new Error(`Batch file not found: ${batchPath}`);
    }
    const startTime = Date.now();
    const dictionary = loadMarkerDictionary(config.dictionaryPath);
    const outputs = runBatch(readFileSync(batchPath, "utf-8"), dictionary, config.specimenId);
    writeFileSync(outputPath, JSON.stringify(outputs, null, 2));
    const elapsed = ((Date.now() - startTime) / 1000).toFixed(2);

    const counts = { ok: 0, needs_review: 0, failed: 0 };
    for (const out of outputs) {
      counts[out.status]++;
      const codes = [...out.validation.errors, ...out.validation.warnings].map((i) => i.code);
      const detail = codes.length > 0 ? `  [${codes.join(", ")}]` : "";
      console.log(`    ${out.input_id}  ${out.status.padEnd(12)} ${out.ihc.markers.length} marker(s)${detail}`);
    }

    console.log();
    console.log(`  Cases:   ${outputs.length} (ok: ${counts.ok}, needs_review: ${counts.needs_review}, failed: ${counts.failed})`);
    console.log(`  Output:  ${outputPath}`);
    console.log(`  Elapsed: ${elapsed}s`);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\n  ✗ Structuring failed: ${message}`);
    process.exit(1);
  }
}

// ── CLI entry point ──────────────────────────────────────────────────
if (
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))
) {
  main();
}
