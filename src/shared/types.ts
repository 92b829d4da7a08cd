/** Validation severity levels */
export type ValidationSeverity = "critical" | "major" | "minor";

/** Validation result status */
export type ValidationStatus = "pass" | "fail" | "warn";

/** Validation result for a single rule */
export interface ValidationResult {
  ruleKey: string;
  severity: ValidationSeverity;
  status: ValidationStatus;
  message: string;
  context?: Record<string, unknown>;
}

/** License categories, in report tie-break order */
export const LICENSE_STATUSES = ["unlicensed", "pending", "exempt", "licensed"] as const;

export type LicenseStatus = (typeof LICENSE_STATUSES)[number];

export type LicenseStatusCounts = Record<LicenseStatus, number>;

/** Number of slots in the listings-by-host-count histogram (1..9, then 10+) */
export const HOST_COUNT_BUCKETS = 10;

export interface HostListingCount {
  hostId: string;
  count: number;
}

export interface PriceSummary {
  count: number;
  mean: number;
  median: number;
}
