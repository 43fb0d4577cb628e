/**
 * Checks shared by the config validator
 *
 * Each check appends to an Issues collector; errors refuse start-up,
 * warnings are logged.
 */

import { isFiniteNumber, isInteger } from '@utils/number';

import type { Issues, Limits } from './types';

export function createIssues(): Issues {
  return { errors: [], warnings: [] };
}

export function fail(issues: Issues, field: string, message: string): void {
  issues.errors.push({ level: 'CRITICAL', field: field, message: message });
}

export function warn(issues: Issues, field: string, message: string): void {
  issues.warnings.push({ level: 'WARNING', field: field, message: message });
}

// ═══════════════════════════════════════════════════════════════
// TYPE CHECKS
// ═══════════════════════════════════════════════════════════════

/**
 * Booleans only; an unset value passes
 */
export function checkBoolean(issues: Issues, field: string, value: unknown): void {
  if (value !== undefined && typeof value !== 'boolean') {
    fail(issues, field, `${field} must be a boolean (got ${typeof value})`);
  }
}

export function checkText(issues: Issues, field: string, value: unknown): void {
  if (typeof value !== 'string' || value.trim() === '') {
    fail(issues, field, `${field} must be a non-empty string`);
  }
}

/**
 * Flag every field whose index an earlier field already took
 */
export function checkDistinct(
  issues: Issues,
  entries: ReadonlyArray<{ field: string; value: number }>
): void {
  const owners = new Map<number, string>();

  for (const entry of entries) {
    const owner = owners.get(entry.value);
    if (owner === undefined) {
      owners.set(entry.value, entry.field);
      continue;
    }
    fail(issues, entry.field, `${entry.field} uses the same index as ${owner} (${entry.value})`);
  }
}

// ═══════════════════════════════════════════════════════════════
// RANGE CHECKS
// ═══════════════════════════════════════════════════════════════

/**
 * Number inside limits
 *
 * Outside [min, max] (or NaN) is an error. Inside it but outside
 * limits.recommended is a warning. An unset value passes.
 */
export function checkNumber(issues: Issues, field: string, value: number | undefined, limits: Limits): void {
  if (value === undefined) return;

  if (!isFiniteNumber(value) || value < limits.min || value > limits.max) {
    fail(issues, field, `${field} must be between ${limits.min} and ${limits.max} (got ${value})`);
    return;
  }

  const recommended = limits.recommended;
  if (recommended && (value < recommended[0] || value > recommended[1])) {
    warn(issues, field, `${field} is outside recommended range ${recommended[0]}-${recommended[1]} (got ${value})`);
  }
}

/**
 * Integer inside limits; fractions fail before the range is looked at
 */
export function checkInteger(issues: Issues, field: string, value: number | undefined, limits: Limits): void {
  if (value === undefined) return;

  if (!isInteger(value)) {
    fail(issues, field, `${field} must be an integer (got ${value})`);
    return;
  }
  checkNumber(issues, field, value, limits);
}
