/**
 * Report Builder — assembles the listings report section by section.
 *
 * Each section computes its aggregates, validates them, and only then
 * contributes text. The first section with a critical validation failure
 * stops assembly; no partial report text is returned in that case.
 */

import type { Listing } from "../listings/schema.js";
import { ENTIRE_HOME } from "../listings/schema.js";
import {
  countListingsByHostCount,
  countListingsByType,
  countLongTermRentals,
  countMultiListings,
  countShortTermRentals,
  getHostNameById,
  getLicenseStatus,
  getPrices,
  listingsPerHostWithType,
  sortedLicenseStatuses,
  sortedRoomTypes,
  summarizePrices,
  topHosts,
} from "../analytics/listings.js";
import {
  hasCriticalFailures,
  validateDataset,
  validateHostBuckets,
  validateHostListings,
  validateLicenseStatus,
  validatePrices,
  validateRentalTerms,
  validateRoomTypes,
} from "./validator.js";
import { banner, countWithShare, formatCount, formatPercent, formatPrice, padColumn } from "./format.js";
import type { HostListingCount, ValidationResult } from "../shared/types.js";

export interface ReportOptions {
  /** File name shown in the report banner */
  sourceName: string;
  /** Free-text snapshot date shown under the banner, e.g. "December 18, 2024" */
  dataAsOf: string;
  /** How many hosts the top-host tables list */
  topHostLimit?: number;
}

export type ReportSectionId =
  | "summary"
  | "rental_terms"
  | "room_types"
  | "license_status"
  | "host_portfolio"
  | "prices"
  | "top_hosts";

export type ReportBuildResult =
  | { ok: true; text: string; validation: ValidationResult[] }
  | { ok: false; failedSection: ReportSectionId; validation: ValidationResult[] };

export interface SectionInput {
  data: readonly Listing[];
  total: number;
  options: Required<ReportOptions>;
}

export interface SectionOutput {
  validation: ValidationResult[];
  lines: string[];
}

export interface ReportSection {
  id: ReportSectionId;
  build(input: SectionInput): SectionOutput;
}

// ── Sections ────────────────────────────────────────────────────────

const summarySection: ReportSection = {
  id: "summary",
  build({ data, total, options }) {
    return {
      validation: validateDataset(data),
      lines: [
        banner(),
        `REPORT FOR ${options.sourceName}`,
        `(Data as of ${options.dataAsOf})`,
        banner(),
        "",
        `Total listings: ${formatCount(total)}`,
      ],
    };
  },
};

const rentalTermsSection: ReportSection = {
  id: "rental_terms",
  build({ data, total }) {
    const shortTerm = countShortTermRentals(data);
    const longTerm = countLongTermRentals(data);
    return {
      validation: validateRentalTerms(total, shortTerm, longTerm),
      lines: [
        "",
        "Listings that are:",
        `Short-term rentals : ${countWithShare(shortTerm, total)}`,
        `Longer-term rentals: ${countWithShare(longTerm, total)}`,
        "",
      ],
    };
  },
};

const roomTypesSection: ReportSection = {
  id: "room_types",
  build({ data, total }) {
    const byType = countListingsByType(data);
    return {
      validation: validateRoomTypes(data, byType),
      lines: [
        "Listings with room type:",
        ...sortedRoomTypes(byType).map(
          ([roomType, count]) => `${padColumn(roomType, 15)}: ${countWithShare(count, total)}`,
        ),
      ],
    };
  },
};

const licenseStatusSection: ReportSection = {
  id: "license_status",
  build({ data, total }) {
    const counts = getLicenseStatus(data);
    const atLeastUnlicensed = counts.unlicensed + counts.pending;
    return {
      validation: validateLicenseStatus(total, counts),
      lines: [
        "",
        `Number of unlicensed current listings, at least ${countWithShare(atLeastUnlicensed, total)}; ` +
          `including ${formatCount(counts.unlicensed)} with missing license and ${formatCount(counts.pending)} pending`,
        ...sortedLicenseStatuses(counts).map(
          ([status, count]) => `${padColumn(status, 10)}: ${formatCount(count)}`,
        ),
      ],
    };
  },
};

const hostPortfolioSection: ReportSection = {
  id: "host_portfolio",
  build({ data, total }) {
    const multi = countMultiListings(data);
    const buckets = countListingsByHostCount(data);
    const bucketLines = buckets.map((count, i) =>
      i < buckets.length - 1
        ? `Listings by hosts with ${i + 1} listings  : ${formatCount(count)}`
        : `Listings by hosts with ${i + 1}+ listings: ${formatCount(count)}`,
    );
    return {
      validation: validateHostBuckets(total, multi, buckets),
      lines: [
        "",
        `Number of listings by hosts with multiple listings: ${formatCount(multi)} out of ${formatCount(total)} total listings ` +
          `(${formatPercent(multi, total)}%)`,
        "",
        ...bucketLines,
      ],
    };
  },
};

function priceLines(prices: readonly number[], countLabel: string, statLabel: string): string[] {
  const summary = summarizePrices(prices);
  const lines = [`${formatCount(summary.count)} ${countLabel}`];
  if (summary.count > 0) {
    lines.push(`Average ${statLabel} price ${formatPrice(summary.mean)}`);
    lines.push(`Median ${statLabel} price  ${formatPrice(summary.median)}`);
  }
  return lines;
}

const pricesSection: ReportSection = {
  id: "prices",
  build({ data }) {
    const prices = getPrices(data);
    const homePrices = getPrices(data, ENTIRE_HOME);
    return {
      validation: validatePrices(prices),
      lines: [
        "",
        "-----Analyzing prices-----",
        ...priceLines(prices, "prices in the list", "listing"),
        "",
        ...priceLines(homePrices, `prices for ${ENTIRE_HOME}`, "entire apt"),
      ],
    };
  },
};

function hostLines(data: readonly Listing[], hosts: HostListingCount[]): string[] {
  return hosts.map(({ hostId, count }) => `${padColumn(getHostNameById(data, hostId), 17)} has ${count}`);
}

const topHostsSection: ReportSection = {
  id: "top_hosts",
  build({ data, total, options }) {
    const perHost = listingsPerHostWithType(data);
    const overall = topHosts(perHost, options.topHostLimit);
    const entireHome = topHosts(listingsPerHostWithType(data, ENTIRE_HOME), options.topHostLimit);
    return {
      validation: validateHostListings(total, perHost),
      lines: [
        "",
        `-----Top ${overall.length} hosts with the largest number of listings-----`,
        ...hostLines(data, overall),
        "",
        `-----Top ${entireHome.length} hosts with largest number of entire home listings-----`,
        ...hostLines(data, entireHome),
      ],
    };
  },
};

/** Sections in report order. */
export const REPORT_SECTIONS: readonly ReportSection[] = [
  summarySection,
  rentalTermsSection,
  roomTypesSection,
  licenseStatusSection,
  hostPortfolioSection,
  pricesSection,
  topHostsSection,
];

// ── Assembly ────────────────────────────────────────────────────────

export function buildReport(data: readonly Listing[], options: ReportOptions): ReportBuildResult {
  const input: SectionInput = {
    data,
    total: data.length,
    options: { ...options, topHostLimit: options.topHostLimit ?? 10 },
  };
  const validation: ValidationResult[] = [];
  const lines: string[] = [];

  for (const section of REPORT_SECTIONS) {
    const output = section.build(input);
    validation.push(...output.validation);
    if (hasCriticalFailures(output.validation)) {
      return { ok: false, failedSection: section.id, validation };
    }
    lines.push(...output.lines);
  }

  return { ok: true, text: lines.join("\n") + "\n", validation };
}
