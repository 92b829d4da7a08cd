/**
 * Run Configuration Tests
 *
 * Covers: defaults, env fallback, CLI priority, flag parsing.
 */

import { describe, it, expect } from "vitest";
import {
  DEFAULT_DATA_AS_OF,
  DEFAULT_INPUT,
  DEFAULT_OUTPUT,
  parseFlag,
  resolveRunConfig,
} from "../src/shared/run_config.js";

describe("resolveRunConfig", () => {
  it("uses defaults when no args or env", () => {
    expect(resolveRunConfig([])).toEqual({
      inputPath: DEFAULT_INPUT,
      outputPath: DEFAULT_OUTPUT,
      dataAsOf: DEFAULT_DATA_AS_OF,
      quiet: false,
    });
    expect(DEFAULT_INPUT).toBe("chicago_listings.csv");
    expect(DEFAULT_OUTPUT).toBe("report.txt");
  });

  it("falls back to env vars when no CLI arg", () => {
    const config = resolveRunConfig([], {
      LISTINGS_INPUT: "austin.csv",
      LISTINGS_OUTPUT: "austin.txt",
      LISTINGS_DATA_AS_OF: "March 1, 2025",
      LISTINGS_QUIET: "true",
    });
    expect(config).toEqual({
      inputPath: "austin.csv",
      outputPath: "austin.txt",
      dataAsOf: "March 1, 2025",
      quiet: true,
    });
  });

  it("CLI args take priority over env vars", () => {
    const config = resolveRunConfig(
      ["--input", "cli.csv", "--as-of", "today", "--quiet"],
      { LISTINGS_INPUT: "env.csv", LISTINGS_DATA_AS_OF: "yesterday", LISTINGS_QUIET: "0" },
    );
    expect(config.inputPath).toBe("cli.csv");
    expect(config.dataAsOf).toBe("today");
    expect(config.outputPath).toBe(DEFAULT_OUTPUT);
    expect(config.quiet).toBe(true);
  });

  it("ignores unknown arguments", () => {
    expect(resolveRunConfig(["--verbose", "--output", "out.txt"]).outputPath).toBe("out.txt");
  });

  it("throws when a flag has no value", () => {
    expect(() => resolveRunConfig(["--input"])).toThrow("Missing value for --input");
  });

  it("rejects an empty path", () => {
    expect(() => resolveRunConfig(["--output", ""])).toThrow();
  });
});

describe("parseFlag", () => {
  it("accepts common truthy spellings", () => {
    expect(parseFlag("1")).toBe(true);
    expect(parseFlag("TRUE")).toBe(true);
    expect(parseFlag(" yes ")).toBe(true);
  });

  it("treats anything else as false", () => {
    expect(parseFlag()).toBe(false);
    expect(parseFlag("0")).toBe(false);
    expect(parseFlag("off")).toBe(false);
  });
});
