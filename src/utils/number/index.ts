/**
 * Number utilities
 *
 * Strict checks that never coerce their argument, plus range helpers
 * shared by the sampler and the codec.
 */

/**
 * Check if a value is a finite number
 *
 * Unlike global isFinite(), this does NOT coerce to number first.
 * - isFiniteNumber(null) = false
 * - isFiniteNumber("5") = false
 *
 * @param value - Value to check
 * @returns true if value is a finite number
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Check if a value is an integer
 *
 * @param value - Value to check
 * @returns true if value is an integer
 */
export function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

/**
 * Clamp a value into [min, max]
 */
export function clamp(value: number, min: number, max: number): number {
  if (value < min) return min;
  if (value > max) return max;
  return value;
}
