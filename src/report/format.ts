/**
 * Text formatting helpers for the listings report.
 */

import { percentOf } from "../analytics/stats.js";

const countFormatter = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

/**
 * Like Number#toFixed, but an exact half-way value rounds to the even digit
 * (toFixed always takes the larger one): 6.25 → "6.2", 6.75 → "6.8".
 * Non-ties already round to nearest on the exact binary value.
 */
export function toFixedHalfEven(value: number, decimals: number): string {
  const magnitude = Math.abs(value);
  if (magnitude >= 1e21) return value.toFixed(decimals);
  const exact = magnitude.toFixed(60);
  const point = exact.indexOf(".");
  const cut = decimals === 0 ? point : point + 1 + decimals;
  if (!/^\.?50*$/.test(exact.slice(cut))) return value.toFixed(decimals);

  const kept = exact.slice(0, cut);
  const lastDigit = Number(kept[kept.length - 1]);
  const rounded = lastDigit % 2 === 0 ? kept : magnitude.toFixed(decimals);
  return value < 0 ? `-${rounded}` : rounded;
}

/** Integer count with thousands separators: 12345 → "12,345". */
export function formatCount(value: number): string {
  return countFormatter.format(value);
}

/** Share of total as a one-decimal percentage without the sign: (1, 3) → "33.3". */
export function formatPercent(part: number, total: number): string {
  return toFixedHalfEven(percentOf(part, total), 1);
}

/** Dollar amount with two decimals and no grouping: 1234.5 → "$1234.50". */
export function formatPrice(value: number): string {
  return `$${toFixedHalfEven(value, 2)}`;
}

/** "<count> (<percent>%)" */
export function countWithShare(part: number, total: number): string {
  return `${formatCount(part)} (${formatPercent(part, total)}%)`;
}

/** Left-align text in a column of `width` characters, counting code points. */
export function padColumn(text: string, width: number): string {
  return text + " ".repeat(Math.max(0, width - [...text].length));
}

export function banner(width: number = 31): string {
  return "*".repeat(width);
}
