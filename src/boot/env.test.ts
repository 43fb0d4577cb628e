/**
 * Tests for environment overrides
 */

import { readEnvOverrides } from './env';

describe('readEnvOverrides', () => {
  it('should return nothing for an empty environment', () => {
    expect(readEnvOverrides({})).toEqual({ overrides: {}, problems: [] });
  });

  it('should map BRIDGE_* variables onto settings', () => {
    const result = readEnvOverrides({
      BRIDGE_SLOT: '1',
      BRIDGE_JOYSTICK_DIR: ' /tmp/input ',
      BRIDGE_DEADZONE: '0.1',
      BRIDGE_TICK_MS: '40',
      BRIDGE_KEEPALIVE_MS: '200',
      BRIDGE_SCAN_MS: '5000',
      BRIDGE_CONNECT_TIMEOUT_MS: '30000',
      BRIDGE_RECONNECT_ATTEMPTS: '3',
      BRIDGE_TELEMETRY_PORT: '8787',
      BRIDGE_TELEMETRY_HOST: '0.0.0.0',
      BRIDGE_COLOR: 'off'
    });

    expect(result.problems).toEqual([]);
    expect(result.overrides).toEqual({
      CONTROLLER_SLOT: 1,
      JOYSTICK_DEVICE_DIR: '/tmp/input',
      DEADZONE: 0.1,
      TICK_PERIOD_MS: 40,
      KEEPALIVE_MS: 200,
      SCAN_DURATION_MS: 5000,
      CONNECT_TIMEOUT_MS: 30000,
      RECONNECT_MAX_ATTEMPTS: 3,
      TELEMETRY_PORT: 8787,
      TELEMETRY_HOST: '0.0.0.0',
      CONSOLE_COLOR: false
    });
  });

  it('should set both global and console level from BRIDGE_LOG_LEVEL', () => {
    const result = readEnvOverrides({ BRIDGE_LOG_LEVEL: 'debug' });

    expect(result.overrides).toEqual({ GLOBAL_LOG_LEVEL: 0, CONSOLE_LOG_LEVEL: 0 });
  });

  it('should enable the file sink from BRIDGE_LOG_FILE', () => {
    const result = readEnvOverrides({ BRIDGE_LOG_FILE: 'logs/run.log' });

    expect(result.overrides).toEqual({ FILE_LOG_ENABLED: true, FILE_LOG_PATH: 'logs/run.log' });
  });

  it('should ignore blank values', () => {
    const result = readEnvOverrides({ BRIDGE_SLOT: '  ', BRIDGE_LOG_FILE: '' });

    expect(result).toEqual({ overrides: {}, problems: [] });
  });

  it('should report values that do not parse', () => {
    const result = readEnvOverrides({
      BRIDGE_DEADZONE: 'small',
      BRIDGE_COLOR: 'maybe',
      BRIDGE_LOG_LEVEL: 'loud'
    });

    expect(result.overrides).toEqual({});
    expect(result.problems).toEqual([
      'BRIDGE_DEADZONE must be a number (got "small")',
      'BRIDGE_LOG_LEVEL must be debug, info, warning or critical (got "loud")',
      'BRIDGE_COLOR must be true or false (got "maybe")'
    ]);
  });
});
