/**
 * Codec helper functions
 */

import { InvalidInputError } from '$types/errors';
import { isFiniteNumber } from '@utils/number';

import { ENGAGE_THRESHOLD } from './types';

/**
 * Reject axis values outside the codec's contract
 * @param value - Axis fraction
 * @param field - Name used in the error message
 * @throws {InvalidInputError} When value is not a finite number in [-1, 1]
 */
export function assertAxis(value: number, field: string): void {
  if (!isFiniteNumber(value) || value < -1 || value > 1) {
    throw new InvalidInputError(field + ' must be a finite number in [-1, 1] (got ' + value + ')');
  }
}

/**
 * Split an axis into its (negative, positive) direction bytes
 * @returns [1, 0] below -ENGAGE_THRESHOLD, [0, 1] above it, [0, 0] otherwise
 */
export function directionBytes(value: number): [number, number] {
  if (value < -ENGAGE_THRESHOLD) return [1, 0];
  if (value > ENGAGE_THRESHOLD) return [0, 1];
  return [0, 0];
}

/**
 * Lowercase hex with single spaces between bytes ("01 00 00 01")
 */
export function frameToHex(frame: Uint8Array): string {
  const parts: string[] = [];
  for (const byte of frame) {
    parts.push(byte.toString(16).padStart(2, '0'));
  }
  return parts.join(' ');
}

/**
 * Byte-wise equality of two frames
 */
export function framesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
