/**
 * Calculate arithmetic mean of an array of numbers.
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sum = values.reduce((a, b) => a + b, 0);
  return sum / values.length;
}

/**
 * Median of an array of numbers. Even-length input averages the two middle
 * values. The input is not reordered.
 */
export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) return sorted[mid];
  return (sorted[mid - 1] + sorted[mid]) / 2;
}

/**
 * Sum of an array of numbers.
 */
export function sum(values: readonly number[]): number {
  return values.reduce((a, b) => a + b, 0);
}

/**
 * Share of `part` in `total` as a percentage. 0 when total is 0.
 */
export function percentOf(part: number, total: number): number {
  if (total === 0) return 0;
  return (part / total) * 100;
}
