/**
 * Listings Analytics — counts, groupings and price lists over a listings dataset.
 *
 * Every function here is pure and leaves the dataset untouched.
 * Maps preserve first-appearance order of their keys.
 */

import type { Listing, ListingField } from "../listings/schema.js";
import { ReportError } from "../shared/errors.js";
import {
  HOST_COUNT_BUCKETS,
  LICENSE_STATUSES,
  type HostListingCount,
  type LicenseStatus,
  type LicenseStatusCounts,
  type PriceSummary,
} from "../shared/types.js";
import { mean, median } from "./stats.js";

export const HOST_NAME_NOT_FOUND = "Name not found";

/** Minimum-nights threshold separating short-term from longer-term rentals. */
export const SHORT_TERM_MAX_NIGHTS = 30;

const EXEMPT_MARKERS = ["32+", "32-", "32 +", "32 -"];

const INTEGER_RE = /^\s*[+-]?\d+\s*$/;
const DECIMAL_RE = /^\s*[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?\s*$/;

function malformed(listing: Listing, field: ListingField, expected: string): ReportError {
  return new ReportError(
    "malformed_field",
    `Listing ${listing.id}: ${field} "${listing[field]}" is not ${expected}`,
  );
}

function parseIntegerField(listing: Listing, field: ListingField): number {
  const raw = listing[field];
  if (!INTEGER_RE.test(raw)) throw malformed(listing, field, "an integer");
  return Number.parseInt(raw, 10);
}

function parseDecimalField(listing: Listing, field: ListingField): number {
  const raw = listing[field];
  if (!DECIMAL_RE.test(raw)) throw malformed(listing, field, "a number");
  return Number(raw);
}

function matchesRoomType(listing: Listing, roomType: string): boolean {
  return roomType === "" || listing.roomType === roomType;
}

/**
 * Host name of the last listing with the given host id.
 * Earlier matches are overwritten, so a host renamed mid-file reports its last name.
 */
export function getHostNameById(data: readonly Listing[], hostId: string): string {
  let name = HOST_NAME_NOT_FOUND;
  for (const listing of data) {
    if (listing.hostId === hostId) name = listing.hostName;
  }
  return name;
}

/** Listings with a minimum stay strictly below 30 nights. */
export function countShortTermRentals(data: readonly Listing[]): number {
  let count = 0;
  for (const listing of data) {
    if (parseIntegerField(listing, "minimumNights") < SHORT_TERM_MAX_NIGHTS) count++;
  }
  return count;
}

/** Listings with a minimum stay of 30 nights or more. */
export function countLongTermRentals(data: readonly Listing[]): number {
  let count = 0;
  for (const listing of data) {
    if (parseIntegerField(listing, "minimumNights") >= SHORT_TERM_MAX_NIGHTS) count++;
  }
  return count;
}

/**
 * Number of listings per observed room type. Listings without a room type are skipped.
 */
export function countListingsByType(data: readonly Listing[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const listing of data) {
    if (listing.roomType === "") continue;
    counts.set(listing.roomType, (counts.get(listing.roomType) ?? 0) + 1);
  }
  return counts;
}

/**
 * Classify a license field. First match wins:
 * empty, then "pending" (any case), then a "32±" exemption marker, else licensed.
 */
export function classifyLicense(license: string): LicenseStatus {
  if (license === "") return "unlicensed";
  if (license.toLowerCase().includes("pending")) return "pending";
  if (EXEMPT_MARKERS.some((marker) => license.includes(marker))) return "exempt";
  return "licensed";
}

export function getLicenseStatus(data: readonly Listing[]): LicenseStatusCounts {
  const counts: LicenseStatusCounts = { unlicensed: 0, pending: 0, exempt: 0, licensed: 0 };
  for (const listing of data) {
    counts[classifyLicense(listing.license)]++;
  }
  return counts;
}

/**
 * Total number of listings owned by hosts with at least two listings
 * (the "multi-listings" figure, not the number of such hosts).
 */
export function countMultiListings(data: readonly Listing[]): number {
  let total = 0;
  for (const count of listingsPerHostWithType(data).values()) {
    if (count >= 2) total += count;
  }
  return total;
}

/**
 * Listings grouped by the size of their host's portfolio.
 * Index i holds the listings of hosts with exactly i + 1 listings;
 * the last index holds the listings of hosts with 10 or more.
 */
export function countListingsByHostCount(data: readonly Listing[]): number[] {
  const buckets = new Array<number>(HOST_COUNT_BUCKETS).fill(0);
  for (const count of listingsPerHostWithType(data).values()) {
    const index = Math.min(count, HOST_COUNT_BUCKETS) - 1;
    buckets[index] += count;
  }
  return buckets;
}

/**
 * Prices of all listings with a non-empty price, in dataset order.
 * A non-empty roomType restricts the list to that exact room type.
 */
export function getPrices(data: readonly Listing[], roomType: string = ""): number[] {
  const prices: number[] = [];
  for (const listing of data) {
    if (!matchesRoomType(listing, roomType) || listing.price === "") continue;
    prices.push(parseDecimalField(listing, "price"));
  }
  return prices;
}

/**
 * Listing count per host id. With a roomType only listings of that type
 * are counted, but every host in the dataset keeps a key (0 when none match).
 */
export function listingsPerHostWithType(
  data: readonly Listing[],
  roomType: string = "",
): Map<string, number> {
  const counts = new Map<string, number>();
  for (const listing of data) {
    const current = counts.get(listing.hostId) ?? 0;
    counts.set(listing.hostId, matchesRoomType(listing, roomType) ? current + 1 : current);
  }
  return counts;
}

/**
 * Hosts with the most listings, highest first. Ties keep map insertion order.
 */
export function topHosts(counts: ReadonlyMap<string, number>, limit: number = 10): HostListingCount[] {
  return [...counts.entries()]
    .map(([hostId, count]) => ({ hostId, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
}

export function summarizePrices(prices: readonly number[]): PriceSummary {
  return { count: prices.length, mean: mean(prices), median: median(prices) };
}

/** License statuses sorted by descending count; ties keep the fixed status order. */
export function sortedLicenseStatuses(counts: LicenseStatusCounts): Array<[LicenseStatus, number]> {
  return LICENSE_STATUSES.map((status): [LicenseStatus, number] => [status, counts[status]]).sort(
    (a, b) => b[1] - a[1],
  );
}

/** Room types sorted by descending count; ties keep first-appearance order. */
export function sortedRoomTypes(counts: ReadonlyMap<string, number>): Array<[string, number]> {
  return [...counts.entries()].sort((a, b) => b[1] - a[1]);
}
