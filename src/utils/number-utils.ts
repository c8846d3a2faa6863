/**
 * Number Utilities
 */

/**
 * Round to a fixed number of decimal places.
 * Example: roundTo(1.23456, 4) -> 1.2346
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
