import type { Listing } from "../listings/schema.js";
import { sum } from "../analytics/stats.js";
import {
  HOST_COUNT_BUCKETS,
  LICENSE_STATUSES,
  type LicenseStatusCounts,
  type ValidationResult,
  type ValidationSeverity,
} from "../shared/types.js";

function check(
  ruleKey: string,
  severity: ValidationSeverity,
  ok: boolean,
  passMessage: string,
  failMessage: string,
  context?: Record<string, unknown>,
): ValidationResult {
  return {
    ruleKey,
    severity,
    status: ok ? "pass" : severity === "critical" ? "fail" : "warn",
    message: ok ? passMessage : failMessage,
    ...(context ? { context } : {}),
  };
}

// ── Dataset ─────────────────────────────────────────────────────────

export function validateDataset(data: readonly Listing[]): ValidationResult[] {
  return [
    check(
      "listings_present",
      "critical",
      data.length > 0,
      `${data.length} listings loaded.`,
      "Dataset contains no listings.",
    ),
  ];
}

// ── Rental term split ───────────────────────────────────────────────

export function validateRentalTerms(
  total: number,
  shortTerm: number,
  longTerm: number,
): ValidationResult[] {
  return [
    check(
      "rental_term_split",
      "critical",
      shortTerm >= 0 && longTerm >= 0 && shortTerm + longTerm === total,
      "Short-term and longer-term rentals account for every listing.",
      `Short-term (${shortTerm}) + longer-term (${longTerm}) does not equal ${total} listings.`,
      { total, shortTerm, longTerm },
    ),
  ];
}

// ── Room types ──────────────────────────────────────────────────────

export function validateRoomTypes(
  data: readonly Listing[],
  byType: ReadonlyMap<string, number>,
): ValidationResult[] {
  const typed = data.filter((l) => l.roomType !== "").length;
  const counted = sum([...byType.values()]);
  const missing = data.length - typed;
  return [
    check(
      "room_type_total",
      "critical",
      counted === typed,
      "Room type counts account for every typed listing.",
      `Room type counts sum to ${counted}, expected ${typed}.`,
      { counted, typed },
    ),
    check(
      "room_type_missing",
      "minor",
      missing === 0,
      "Every listing has a room type.",
      `${missing} listings have no room type and are left out of the breakdown.`,
      { missing },
    ),
  ];
}

// ── License status ──────────────────────────────────────────────────

export function validateLicenseStatus(
  total: number,
  counts: LicenseStatusCounts,
): ValidationResult[] {
  const missingKeys = LICENSE_STATUSES.filter((s) => !(s in counts));
  const counted = sum(LICENSE_STATUSES.map((s) => counts[s] ?? 0));
  return [
    check(
      "license_keys_present",
      "critical",
      missingKeys.length === 0,
      "All license categories present.",
      `License categories missing: ${missingKeys.join(", ")}.`,
      { missingKeys },
    ),
    check(
      "license_total",
      "critical",
      counted === total,
      "License categories account for every listing.",
      `License categories sum to ${counted}, expected ${total}.`,
      { counted, total },
    ),
  ];
}

// ── Host portfolio ──────────────────────────────────────────────────

export function validateHostBuckets(
  total: number,
  multiListings: number,
  buckets: readonly number[],
): ValidationResult[] {
  const single = buckets.length > 0 ? buckets[0] : 0;
  const bucketTotal = sum(buckets);
  return [
    check(
      "single_listing_bucket",
      "critical",
      single === total - multiListings,
      "Single-listing hosts account for every non-multi listing.",
      `Single listing count ${single} does not equal ${total} - ${multiListings}.`,
      { single, total, multiListings },
    ),
    check(
      "host_bucket_total",
      "critical",
      buckets.length === HOST_COUNT_BUCKETS && bucketTotal === total,
      "Host-count buckets account for every listing.",
      `Host-count buckets (${buckets.length}) sum to ${bucketTotal}, expected ${total}.`,
      { buckets: buckets.length, bucketTotal, total },
    ),
  ];
}

// ── Prices ──────────────────────────────────────────────────────────

export function validatePrices(prices: readonly number[]): ValidationResult[] {
  return [
    check(
      "prices_present",
      "major",
      prices.length > 0,
      `${prices.length} listings carry a price.`,
      "No listing carries a price; price statistics are omitted.",
    ),
  ];
}

// ── Listings per host ───────────────────────────────────────────────

export function validateHostListings(
  total: number,
  perHost: ReadonlyMap<string, number>,
): ValidationResult[] {
  const counted = sum([...perHost.values()]);
  return [
    check(
      "host_listing_total",
      "critical",
      counted === total,
      "Per-host listing counts account for every listing.",
      `Per-host listing counts sum to ${counted}, expected ${total}.`,
      { counted, total },
    ),
  ];
}

/**
 * Check if any critical validation failures exist.
 */
export function hasCriticalFailures(results: ValidationResult[]): boolean {
  return results.some((r) => r.severity === "critical" && r.status === "fail");
}

export function criticalFailures(results: ValidationResult[]): ValidationResult[] {
  return results.filter((r) => r.severity === "critical" && r.status === "fail");
}
