/**
 * Clock sources
 *
 * Wall-clock time stamps logs and telemetry; the monotonic clock paces the
 * control loop and measures tick durations.
 */

import { performance } from 'node:perf_hooks';

/**
 * Get current Unix timestamp in seconds
 * @returns Current time in seconds since epoch
 */
export function now(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Get current timestamp in milliseconds
 * @returns Current time in milliseconds since epoch
 */
export function nowMs(): number {
  return Date.now();
}

/**
 * Milliseconds since process start, unaffected by wall-clock changes
 */
export function monotonicMs(): number {
  return performance.now();
}
