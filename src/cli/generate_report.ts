#!/usr/bin/env tsx
/**
 * CLI: report
 *
 * Usage: npm run report -- [--input <csv>] [--output <txt>] [--as-of <label>] [--quiet]
 *
 * Loads an Inside Airbnb listings export, validates every aggregate,
 * writes the text report and echoes it to stdout.
 */

import "dotenv/config";
import { existsSync, realpathSync, writeFileSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";

import { loadListings } from "../listings/loader.js";
import { buildReport } from "../report/builder.js";
import { criticalFailures } from "../report/validator.js";
import { ReportError } from "../shared/errors.js";
import { sha256String } from "../shared/hash.js";
import { resolveRunConfig, type RunConfig } from "../shared/run_config.js";
import type { ValidationResult } from "../shared/types.js";

/**
 * True when `scriptPath` (usually process.argv[1]) is the module at `moduleUrl`.
 * Symlinks are resolved first: Node reports the real path in import.meta.url.
 */
export function isEntryPoint(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (!scriptPath || !existsSync(scriptPath)) return false;
  return realpathSync(path.resolve(scriptPath)) === realpathSync(fileURLToPath(moduleUrl));
}

export type StepLogger = (step: string, msg: string) => void;

export interface GenerateReportResult {
  outputPath: string;
  text: string;
  sha256: string;
  validation: ValidationResult[];
}

/**
 * Load, build and write the report. Throws ReportError on missing input,
 * malformed data or a failed consistency check; nothing is written in that case.
 */
export function generateReport(config: RunConfig, log: StepLogger = () => {}): GenerateReportResult {
  log("LOAD", `Input: ${config.inputPath}`);
  const listings = loadListings(config.inputPath);
  log("LOAD", `${listings.length} listings decoded`);

  const result = buildReport(listings, {
    sourceName: path.basename(config.inputPath),
    dataAsOf: config.dataAsOf,
  });

  const passes = result.validation.filter((r) => r.status === "pass");
  const warns = result.validation.filter((r) => r.status === "warn");
  const fails = criticalFailures(result.validation);
  log("VALIDATION", `${passes.length} pass / ${warns.length} warn / ${fails.length} fail`);
  for (const w of warns) {
    log("VALIDATION", `  [${w.severity}] ${w.ruleKey}: ${w.message}`);
  }

  if (!result.ok) {
    throw new ReportError(
      "consistency_violation",
      `Consistency check failed in section "${result.failedSection}": ${fails.map((f) => f.message).join(" ")}`,
      fails,
    );
  }

  writeFileSync(config.outputPath, result.text, "utf-8");
  const sha256 = sha256String(result.text);
  log("OUTPUT", `Report written to: ${config.outputPath}`);
  log("OUTPUT", `SHA-256: ${sha256}`);

  return { outputPath: config.outputPath, text: result.text, sha256, validation: result.validation };
}

function main(): void {
  const startTime = Date.now();

  function log(step: string, msg: string) {
    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
    console.log(`  [${elapsed}s] [${step}] ${msg}`);
  }

  try {
    const config = resolveRunConfig(process.argv.slice(2), process.env);

    console.log("-".repeat(60));
    console.log(`Validating data and generating report for ${config.inputPath}`);

    const result = generateReport(config, log);

    console.log("-".repeat(60));
    console.log(`Report has been written to ${result.outputPath}`);
    console.log("-".repeat(60) + "\n");
    if (!config.quiet) {
      console.log(result.text);
    }

    const totalTime = ((Date.now() - startTime) / 1000).toFixed(1);
    console.log(`  ✓ Report generation complete in ${totalTime}s`);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\n  ✗ Report generation failed: ${message}`);
    if (err instanceof ReportError) {
      for (const f of err.failures) {
        console.error(`    - ${f.ruleKey}: ${f.message}`);
      }
    } else if (err instanceof Error && err.stack) {
      console.error(err.stack);
    }
    process.exit(1);
  }
}

// ── CLI entry point ──────────────────────────────────────────────────
if (isEntryPoint(process.argv[1], import.meta.url)) {
  main();
}
