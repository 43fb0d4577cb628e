/**
 * Unit tests for validation checks
 */

import {
  checkBoolean,
  checkDistinct,
  checkInteger,
  checkNumber,
  checkText,
  createIssues,
  fail,
  warn
} from './helpers';

import type { Issues } from './types';

describe('Validation checks', () => {
  let issues: Issues;

  beforeEach(() => {
    issues = createIssues();
  });

  describe('fail / warn', () => {
    it('should tag entries with their level', () => {
      fail(issues, 'DEADZONE', 'bad');
      warn(issues, 'DEADZONE', 'odd');

      expect(issues.errors).toEqual([{ level: 'CRITICAL', field: 'DEADZONE', message: 'bad' }]);
      expect(issues.warnings).toEqual([{ level: 'WARNING', field: 'DEADZONE', message: 'odd' }]);
    });
  });

  describe('checkBoolean', () => {
    it('should accept booleans and undefined', () => {
      checkBoolean(issues, 'FLAG', true);
      checkBoolean(issues, 'FLAG', undefined);
      expect(issues.errors).toHaveLength(0);
    });

    it('should reject other types', () => {
      checkBoolean(issues, 'FLAG', 'yes');
      expect(issues.errors[0].message).toBe('FLAG must be a boolean (got string)');
    });
  });

  describe('checkText', () => {
    it('should reject blank strings', () => {
      checkText(issues, 'FILE_LOG_PATH', '  ');
      expect(issues.errors[0].message).toBe('FILE_LOG_PATH must be a non-empty string');
    });

    it('should accept text', () => {
      checkText(issues, 'FILE_LOG_PATH', 'logs/bridge.log');
      expect(issues.errors).toHaveLength(0);
    });
  });

  describe('checkDistinct', () => {
    it('should report the second field that reuses an index', () => {
      checkDistinct(issues, [
        { field: 'BUTTON_ACCELERATE', value: 0 },
        { field: 'BUTTON_BRAKE', value: 1 },
        { field: 'BUTTON_MODE', value: 0 }
      ]);

      expect(issues.errors).toEqual([{
        level: 'CRITICAL',
        field: 'BUTTON_MODE',
        message: 'BUTTON_MODE uses the same index as BUTTON_ACCELERATE (0)'
      }]);
    });
  });

  describe('checkNumber', () => {
    it('should skip undefined values', () => {
      checkNumber(issues, 'X', undefined, { min: 0, max: 1 });
      expect(issues.errors).toHaveLength(0);
    });

    it('should error outside the hard limits', () => {
      checkNumber(issues, 'DEADZONE', 0.7, { min: 0, max: 0.5 });
      expect(issues.errors[0].message).toBe('DEADZONE must be between 0 and 0.5 (got 0.7)');
    });

    it('should error on NaN', () => {
      checkNumber(issues, 'DEADZONE', NaN, { min: 0, max: 0.5 });
      expect(issues.errors[0].message).toBe('DEADZONE must be between 0 and 0.5 (got NaN)');
    });

    it('should warn outside the recommended range only', () => {
      checkNumber(issues, 'DEADZONE', 0.3, { min: 0, max: 0.5, recommended: [0.02, 0.2] });
      expect(issues.errors).toHaveLength(0);
      expect(issues.warnings[0].message).toBe('DEADZONE is outside recommended range 0.02-0.2 (got 0.3)');
    });
  });

  describe('checkInteger', () => {
    it('should reject fractions before checking the range', () => {
      checkInteger(issues, 'TICK_PERIOD_MS', 2.5, { min: 10, max: 1000 });
      expect(issues.errors).toEqual([{
        level: 'CRITICAL',
        field: 'TICK_PERIOD_MS',
        message: 'TICK_PERIOD_MS must be an integer (got 2.5)'
      }]);
    });

    it('should accept integers inside the range', () => {
      checkInteger(issues, 'TICK_PERIOD_MS', 50, { min: 10, max: 1000, recommended: [20, 100] });
      expect(issues.errors).toHaveLength(0);
      expect(issues.warnings).toHaveLength(0);
    });
  });
});
