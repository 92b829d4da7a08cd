/**
 * Listings Loader — reads an Inside Airbnb CSV export and decodes its rows.
 *
 * readData keeps the raw table (header dropped, width unchecked);
 * loadListings additionally decodes every row into a Listing.
 */

import { readFileSync, existsSync } from "fs";
import { parse } from "csv-parse/sync";
import { z } from "zod";

import { ListingRowSchema, LISTING_FIELD_COUNT } from "./schema.js";
import type { Listing, Row } from "./schema.js";
import { ReportError } from "../shared/errors.js";

const RawTableSchema = z.array(z.array(z.string()));

/**
 * Read a CSV file and return every row after the first as a list of strings.
 * The first row is assumed to be the header and is always discarded.
 */
export function readData(csvPath: string): Row[] {
  if (!existsSync(csvPath)) {
    throw new ReportError("missing_input", `Input file not found: ${csvPath}`);
  }
  const buffer = readFileSync(csvPath);
  const records: unknown = parse(buffer.toString("utf-8"), {
    bom: true,
    relax_column_count: true,
  });
  return RawTableSchema.parse(records).slice(1);
}

/**
 * Decode one raw row into a Listing.
 * @param rowNumber 1-based position of the row among the data rows
 */
export function decodeListing(row: Row, rowNumber: number): Listing {
  const parsed = ListingRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new ReportError(
      "malformed_row",
      `Row ${rowNumber} has ${row.length} fields, expected ${LISTING_FIELD_COUNT}`,
    );
  }
  return parsed.data;
}

export function decodeListings(rows: readonly Row[]): Listing[] {
  return rows.map((row, i) => decodeListing(row, i + 1));
}

/**
 * Read and decode a listings CSV in one step.
 */
export function loadListings(csvPath: string): Listing[] {
  return decodeListings(readData(csvPath));
}
