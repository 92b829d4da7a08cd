import type { ValidationResult } from "./types.js";

export type ReportErrorKind =
  | "missing_input"
  | "malformed_row"
  | "malformed_field"
  | "consistency_violation";

/**
 * Fatal error raised anywhere between loading the CSV and writing the report.
 * There is no recovery path: the CLI logs it and exits.
 */
export class ReportError extends Error {
  readonly kind: ReportErrorKind;
  readonly failures: ValidationResult[];

  constructor(kind: ReportErrorKind, message: string, failures: ValidationResult[] = []) {
    super(message);
    this.name = "ReportError";
    this.kind = kind;
    this.failures = failures;
  }
}
