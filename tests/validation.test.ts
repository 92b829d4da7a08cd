import { describe, it, expect } from "vitest";
import {
  criticalFailures,
  hasCriticalFailures,
  validateDataset,
  validateHostBuckets,
  validateHostListings,
  validateLicenseStatus,
  validatePrices,
  validateRentalTerms,
  validateRoomTypes,
} from "../src/report/validator.js";
import { makeListing } from "./helpers/listings.js";

describe("Report Validation", () => {
  it("fails critical: empty dataset", () => {
    const [result] = validateDataset([]);
    expect(result.ruleKey).toBe("listings_present");
    expect(result.status).toBe("fail");
    expect(result.severity).toBe("critical");
  });

  it("passes when listings are present", () => {
    const [result] = validateDataset([makeListing()]);
    expect(result.status).toBe("pass");
    expect(result.message).toBe("1 listings loaded.");
  });

  it("fails critical: rental terms do not add up", () => {
    const [result] = validateRentalTerms(10, 6, 3);
    expect(result.status).toBe("fail");
    expect(result.message).toBe("Short-term (6) + longer-term (3) does not equal 10 listings.");
    expect(result.context).toEqual({ total: 10, shortTerm: 6, longTerm: 3 });
  });

  it("passes rental terms that add up", () => {
    expect(validateRentalTerms(10, 7, 3)[0].status).toBe("pass");
  });

  it("room type total is checked against typed listings only", () => {
    const data = [makeListing({ roomType: "Private room" }), makeListing({ roomType: "" })];
    const results = validateRoomTypes(data, new Map([["Private room", 1]]));
    const total = results.find((r) => r.ruleKey === "room_type_total");
    const missing = results.find((r) => r.ruleKey === "room_type_missing");
    expect(total?.status).toBe("pass");
    expect(missing?.status).toBe("warn");
    expect(missing?.severity).toBe("minor");
    expect(missing?.message).toBe("1 listings have no room type and are left out of the breakdown.");
    expect(hasCriticalFailures(results)).toBe(false);
  });

  it("fails critical: room type counts disagree with the data", () => {
    const data = [makeListing({ roomType: "Private room" })];
    const results = validateRoomTypes(data, new Map([["Private room", 2]]));
    expect(hasCriticalFailures(results)).toBe(true);
    expect(criticalFailures(results).map((r) => r.ruleKey)).toEqual(["room_type_total"]);
  });

  it("license totals must match the listing count", () => {
    const counts = { unlicensed: 1, pending: 1, exempt: 0, licensed: 1 };
    expect(hasCriticalFailures(validateLicenseStatus(3, counts))).toBe(false);
    const failed = criticalFailures(validateLicenseStatus(4, counts));
    expect(failed.map((r) => r.ruleKey)).toEqual(["license_total"]);
    expect(failed[0].message).toBe("License categories sum to 3, expected 4.");
  });

  it("fails critical: single-listing bucket mismatch", () => {
    const results = validateHostBuckets(4, 3, [2, 0, 3, 0, 0, 0, 0, 0, 0, 0]);
    const failed = criticalFailures(results).map((r) => r.ruleKey);
    expect(failed).toEqual(["single_listing_bucket", "host_bucket_total"]);
  });

  it("fails critical: wrong number of buckets", () => {
    const results = validateHostBuckets(4, 3, [1, 0, 3]);
    expect(criticalFailures(results).map((r) => r.ruleKey)).toEqual(["host_bucket_total"]);
  });

  it("passes consistent host buckets", () => {
    expect(hasCriticalFailures(validateHostBuckets(4, 3, [1, 0, 3, 0, 0, 0, 0, 0, 0, 0]))).toBe(false);
  });

  it("warns major: no prices", () => {
    const [result] = validatePrices([]);
    expect(result.status).toBe("warn");
    expect(result.severity).toBe("major");
    expect(validatePrices([10])[0].status).toBe("pass");
  });

  it("per-host counts must sum to the listing count", () => {
    const perHost = new Map([
      ["H1", 2],
      ["H2", 1],
    ]);
    expect(validateHostListings(3, perHost)[0].status).toBe("pass");
    expect(validateHostListings(4, perHost)[0].status).toBe("fail");
  });
});
