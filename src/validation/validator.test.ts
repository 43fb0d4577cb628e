/**
 * Tests for configuration validator
 */

import { USER_CONFIG } from '@boot/config';
import { validateConfig } from './validator';

import type { BridgeUserConfig } from '$types';

function withConfig(overrides: Partial<BridgeUserConfig>): BridgeUserConfig {
  return Object.assign({}, USER_CONFIG, overrides);
}

function messages(entries: ReadonlyArray<{ message: string }>): string[] {
  return entries.map(function (entry) { return entry.message; });
}

describe('validateConfig', () => {
  describe('defaults', () => {
    it('should accept the shipped configuration without warnings', () => {
      const result = validateConfig(USER_CONFIG);

      expect(result.valid).toBe(true);
      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual([]);
    });
  });

  describe('control loop timing', () => {
    it('should error when TICK_PERIOD_MS is below 10', () => {
      const result = validateConfig(withConfig({ TICK_PERIOD_MS: 5 }));

      expect(result.valid).toBe(false);
      expect(messages(result.errors)).toEqual(['TICK_PERIOD_MS must be between 10 and 1000 (got 5)']);
    });

    it('should error when TICK_PERIOD_MS is not an integer', () => {
      const result = validateConfig(withConfig({ TICK_PERIOD_MS: 50.5 }));

      expect(messages(result.errors)).toEqual(['TICK_PERIOD_MS must be an integer (got 50.5)']);
    });

    it('should warn for a slow tick and a keep-alive shorter than the tick', () => {
      const result = validateConfig(withConfig({ TICK_PERIOD_MS: 150 }));

      expect(result.valid).toBe(true);
      expect(messages(result.warnings)).toEqual([
        'TICK_PERIOD_MS is outside recommended range 20-100 (got 150)',
        'KEEPALIVE_MS (100) is below TICK_PERIOD_MS (150); unchanged frames are re-sent every tick'
      ]);
    });
  });

  describe('controller input', () => {
    it('should error when DEADZONE is out of range', () => {
      expect(messages(validateConfig(withConfig({ DEADZONE: 0.6 })).errors))
        .toEqual(['DEADZONE must be between 0 and 0.5 (got 0.6)']);
      expect(messages(validateConfig(withConfig({ DEADZONE: NaN })).errors))
        .toEqual(['DEADZONE must be between 0 and 0.5 (got NaN)']);
    });

    it('should warn when DEADZONE is outside the recommended range', () => {
      const result = validateConfig(withConfig({ DEADZONE: 0.3 }));

      expect(result.valid).toBe(true);
      expect(messages(result.warnings)).toEqual(['DEADZONE is outside recommended range 0.02-0.2 (got 0.3)']);
    });

    it('should error when steering and throttle share an axis', () => {
      const result = validateConfig(withConfig({ STEERING_AXIS: 4 }));

      expect(result.errors).toEqual([
        { level: 'CRITICAL', field: 'THROTTLE_AXIS', message: 'THROTTLE_AXIS must differ from STEERING_AXIS (4)' }
      ]);
    });

    it('should warn when a turbo axis is also a driving axis', () => {
      const result = validateConfig(withConfig({ TURBO_AXES: [2, 0] }));

      expect(result.valid).toBe(true);
      expect(messages(result.warnings)).toEqual(['TURBO_AXES includes driving axis 0; turbo will follow the stick']);
    });

    it('should error when two actions share a button', () => {
      const result = validateConfig(withConfig({ BUTTON_LIGHTS: 0 }));

      expect(messages(result.errors)).toEqual(['BUTTON_LIGHTS uses the same index as BUTTON_ACCELERATE (0)']);
    });
  });

  describe('radio', () => {
    it('should error when the reconnect cap is below the base delay', () => {
      const result = validateConfig(withConfig({ RECONNECT_MAX_DELAY_MS: 400 }));

      expect(messages(result.errors)).toEqual(['RECONNECT_MAX_DELAY_MS must be at least RECONNECT_BASE_DELAY_MS']);
      expect(messages(result.warnings)).toEqual([
        'RECONNECT_MAX_DELAY_MS is outside recommended range 1000-30000 (got 400)'
      ]);
    });

    it('should accept zero reconnect attempts with a warning', () => {
      const result = validateConfig(withConfig({ RECONNECT_MAX_ATTEMPTS: 0 }));

      expect(result.valid).toBe(true);
      expect(messages(result.warnings)).toEqual(['RECONNECT_MAX_ATTEMPTS is outside recommended range 1-10 (got 0)']);
    });

    it('should error when TELEMETRY_PORT is out of range', () => {
      const result = validateConfig(withConfig({ TELEMETRY_PORT: 70000 }));

      expect(messages(result.errors)).toEqual(['TELEMETRY_PORT must be between 0 and 65535 (got 70000)']);
    });

    it('should require a host only when the feed is enabled', () => {
      expect(validateConfig(withConfig({ TELEMETRY_HOST: '' })).valid).toBe(true);
      expect(messages(validateConfig(withConfig({ TELEMETRY_PORT: 8787, TELEMETRY_HOST: '' })).errors))
        .toEqual(['TELEMETRY_HOST must be a non-empty string']);
    });
  });

  describe('logging', () => {
    it('should require a path when the file sink is enabled', () => {
      const result = validateConfig(withConfig({ FILE_LOG_ENABLED: true, FILE_LOG_PATH: ' ' }));

      expect(messages(result.errors)).toEqual(['FILE_LOG_PATH must be a non-empty string']);
    });

    it('should warn when every sink is disabled', () => {
      const result = validateConfig(withConfig({ CONSOLE_ENABLED: false }));

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual([
        { level: 'WARNING', field: 'CONSOLE_ENABLED', message: 'All log sinks are disabled' }
      ]);
    });
  });
});
