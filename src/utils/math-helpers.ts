/**
 * Math Helper Utilities
 *
 * Safe mathematical operations that guard against division by zero,
 * NaN propagation, and other edge cases.
 */

/**
 * Calculate safe division that guards against division by zero
 *
 * @param numerator - Numerator
 * @param denominator - Denominator
 * @param defaultValue - Value to return if denominator is 0 (default: 0)
 * @returns numerator / denominator, or defaultValue if denominator is 0
 *
 * @example
 * ```typescript
 * safeDivide(10, 2)        // => 5
 * safeDivide(10, 0)        // => 0
 * safeDivide(10, 0, 100)   // => 100
 * ```
 */
export function safeDivide(numerator: number, denominator: number, defaultValue = 0): number {
  if (denominator === 0) {
    return defaultValue;
  }

  return numerator / denominator;
}

/**
 * Calculate safe sum that guards against NaN propagation
 *
 * @param values - Array of numbers to sum
 * @param defaultValue - Value to return if array is empty (default: 0)
 * @returns Sum of values, or defaultValue if array is empty
 *
 * @example
 * ```typescript
 * safeSum([1, 2, 3])        // => 6
 * safeSum([])               // => 0
 * safeSum([], 100)          // => 100
 * ```
 */
export function safeSum(values: number[], defaultValue = 0): number {
  if (!values || values.length === 0) {
    return defaultValue;
  }

  return values.reduce((acc, val) => acc + val, 0);
}

/**
 * Calculate a percentile from an ascending array with linear interpolation
 * between the two nearest ranks
 *
 * @param sorted - Ascending array of numbers
 * @param p - Percentile (0-100)
 * @returns Percentile value, or 0 if the array is empty
 *
 * @example
 * ```typescript
 * percentile([10, 20, 30, 40, 50], 50)   // => 30
 * percentile([10, 20], 95)               // => 19.5
 * percentile([], 95)                     // => 0
 * ```
 */
export function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) {
    return 0;
  }

  const index = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(index);
  const upper = Math.ceil(index);
  const weight = index - lower;

  if (lower === upper) {
    return sorted[lower];
  }

  return sorted[lower] * (1 - weight) + sorted[upper] * weight;
}

/**
 * Format a 0-1 ratio as a percentage with two decimals
 *
 * @example
 * ```typescript
 * formatPercent(0.8)      // => '80.00%'
 * formatPercent(0.9512)   // => '95.12%'
 * ```
 */
export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(2)}%`;
}
