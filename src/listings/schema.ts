/**
 * Listing Schema — positional layout of an Inside Airbnb "listings.csv"
 * summary export and its decoding into named fields.
 */
import { z } from "zod";

const field = z.string();

/**
 * One CSV data row, exactly 18 string fields wide, decoded into a named record.
 * Values stay as strings; empty string means the source left the cell blank.
 */
export const ListingRowSchema = z
  .tuple([
    field, field, field, field, field, field,
    field, field, field, field, field, field,
    field, field, field, field, field, field,
  ])
  .transform(
    ([
      id,
      name,
      hostId,
      hostName,
      neighbourhoodGroup,
      neighbourhood,
      latitude,
      longitude,
      roomType,
      price,
      minimumNights,
      numberOfReviews,
      lastReview,
      reviewsPerMonth,
      calculatedHostListingsCount,
      availability365,
      numberOfReviewsLtm,
      license,
    ]) => ({
      id,
      name,
      hostId,
      hostName,
      neighbourhoodGroup,
      neighbourhood,
      latitude,
      longitude,
      roomType,
      price,
      minimumNights,
      numberOfReviews,
      lastReview,
      reviewsPerMonth,
      calculatedHostListingsCount,
      availability365,
      numberOfReviewsLtm,
      license,
    }),
  );

export type Listing = Readonly<z.output<typeof ListingRowSchema>>;

export type ListingField = keyof Listing;

/** A raw CSV row before decoding. */
export type Row = string[];

export const LISTING_FIELD_COUNT = 18;

/** Room type used for the "entire home" sections of the report. */
export const ENTIRE_HOME = "Entire home/apt";
