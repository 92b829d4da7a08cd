/**
 * Run Configuration Module
 *
 * Resolves where the report generator reads and writes:
 * - CLI flags:    --input <path> --output <path> --as-of <label> --quiet
 * - Environment:  LISTINGS_INPUT, LISTINGS_OUTPUT, LISTINGS_DATA_AS_OF, LISTINGS_QUIET
 * CLI flags take priority over environment variables, which take priority over defaults.
 */
import { z } from "zod";

export const DEFAULT_INPUT = "chicago_listings.csv";
export const DEFAULT_OUTPUT = "report.txt";
export const DEFAULT_DATA_AS_OF = "December 18, 2024";

export const RunConfigSchema = z.object({
  inputPath: z.string().min(1),
  outputPath: z.string().min(1),
  dataAsOf: z.string().min(1),
  quiet: z.boolean(),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;

type Env = Record<string, string | undefined>;

/**
 * Parse a boolean-ish environment value. "1", "true", "yes" (any case) are true.
 */
export function parseFlag(raw?: string): boolean {
  if (raw === undefined) return false;
  return ["1", "true", "yes"].includes(raw.trim().toLowerCase());
}

/**
 * Merge CLI arguments, environment and defaults into a validated RunConfig.
 * Unknown arguments are ignored; a flag missing its value throws.
 */
export function resolveRunConfig(args: readonly string[], env: Env = {}): RunConfig {
  let inputPath: string | undefined;
  let outputPath: string | undefined;
  let dataAsOf: string | undefined;
  let quiet: boolean | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--quiet") {
      quiet = true;
      continue;
    }
    if (arg !== "--input" && arg !== "--output" && arg !== "--as-of") continue;
    if (i + 1 >= args.length) {
      throw new Error(`Missing value for ${arg}`);
    }
    const value = args[++i];
    if (arg === "--input") inputPath = value;
    if (arg === "--output") outputPath = value;
    if (arg === "--as-of") dataAsOf = value;
  }

  return RunConfigSchema.parse({
    inputPath: inputPath ?? env.LISTINGS_INPUT ?? DEFAULT_INPUT,
    outputPath: outputPath ?? env.LISTINGS_OUTPUT ?? DEFAULT_OUTPUT,
    dataAsOf: dataAsOf ?? env.LISTINGS_DATA_AS_OF ?? DEFAULT_DATA_AS_OF,
    quiet: quiet ?? parseFlag(env.LISTINGS_QUIET),
  });
}
