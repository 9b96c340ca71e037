/**
 * Math Helper Utilities
 *
 * Safe mathematical operations for empty inputs and non-finite values.
 */

/**
 * Calculate safe average of an array of numbers
 *
 * @param values - Array of numbers to average
 * @param defaultValue - Value to return if array is empty (default: 0)
 * @returns Average of values, or defaultValue if array is empty
 *
 * @example
 * ```typescript
 * safeAverage([1, 2, 3])        // => 2
 * safeAverage([])               // => 0
 * safeAverage([], 100)          // => 100
 * ```
 */
export function safeAverage(values: readonly number[], defaultValue = 0): number {
  if (values.length === 0) {
    return defaultValue;
  }

  return safeSum(values) / values.length;
}

/**
 * Sum of values, or defaultValue for an empty array
 */
export function safeSum(values: readonly number[], defaultValue = 0): number {
  if (values.length === 0) {
    return defaultValue;
  }

  return values.reduce((acc, val) => acc + val, 0);
}

/**
 * True when every value is a finite number
 *
 * @example
 * ```typescript
 * allFinite(1, 2, 3)          // => true
 * allFinite(1, NaN)           // => false
 * allFinite(Infinity)         // => false
 * ```
 */
export function allFinite(...values: number[]): boolean {
  return values.every((value) => Number.isFinite(value));
}
