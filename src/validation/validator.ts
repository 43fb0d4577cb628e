/**
 * Configuration validator
 *
 * Critical ranges produce errors and abort start-up; recommended ranges
 * produce warnings that are logged once the logger is up.
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

import type { BridgeUserConfig } from '$types';
import type { Issues, Limits, ValidationResult } from './types';

const AXIS_INDEX: Limits = { min: 0, max: 63 };
const BUTTON_INDEX: Limits = { min: 0, max: 127 };
const LOG_LEVEL: Limits = { min: 0, max: 3 };

function validateControlLoop(config: BridgeUserConfig, issues: Issues): void {
  checkInteger(issues, 'TICK_PERIOD_MS', config.TICK_PERIOD_MS, { min: 10, max: 1000, recommended: [20, 100] });
  checkInteger(issues, 'KEEPALIVE_MS', config.KEEPALIVE_MS, { min: 10, max: 5000, recommended: [50, 500] });
  checkInteger(issues, 'TELEMETRY_INTERVAL_MS', config.TELEMETRY_INTERVAL_MS, { min: 50, max: 60000, recommended: [100, 2000] });

  if (config.KEEPALIVE_MS < config.TICK_PERIOD_MS) {
    warn(issues, 'KEEPALIVE_MS',
      'KEEPALIVE_MS (' + config.KEEPALIVE_MS + ') is below TICK_PERIOD_MS (' + config.TICK_PERIOD_MS +
      '); unchanged frames are re-sent every tick');
  }
}

function validateInput(config: BridgeUserConfig, issues: Issues): void {
  checkInteger(issues, 'CONTROLLER_SLOT', config.CONTROLLER_SLOT, { min: 0, max: 31 });
  checkText(issues, 'JOYSTICK_DEVICE_DIR', config.JOYSTICK_DEVICE_DIR);
  checkNumber(issues, 'DEADZONE', config.DEADZONE, { min: 0, max: 0.5, recommended: [0.02, 0.2] });
  checkInteger(issues, 'STEERING_AXIS', config.STEERING_AXIS, AXIS_INDEX);
  checkInteger(issues, 'THROTTLE_AXIS', config.THROTTLE_AXIS, AXIS_INDEX);
  checkBoolean(issues, 'INVERT_STEERING', config.INVERT_STEERING);
  checkBoolean(issues, 'INVERT_THROTTLE', config.INVERT_THROTTLE);
  checkNumber(issues, 'TRIGGER_PRESS_THRESHOLD', config.TRIGGER_PRESS_THRESHOLD, { min: -1, max: 1 });

  if (config.STEERING_AXIS === config.THROTTLE_AXIS) {
    fail(issues, 'THROTTLE_AXIS', 'THROTTLE_AXIS must differ from STEERING_AXIS (' + config.STEERING_AXIS + ')');
  }

  for (const axis of config.TURBO_AXES) {
    checkInteger(issues, 'TURBO_AXES', axis, AXIS_INDEX);
    if (axis === config.STEERING_AXIS || axis === config.THROTTLE_AXIS) {
      warn(issues, 'TURBO_AXES', 'TURBO_AXES includes driving axis ' + axis + '; turbo will follow the stick');
    }
  }

  const buttons = [
    { field: 'BUTTON_ACCELERATE', value: config.BUTTON_ACCELERATE },
    { field: 'BUTTON_BRAKE', value: config.BUTTON_BRAKE },
    { field: 'BUTTON_MODE', value: config.BUTTON_MODE },
    { field: 'BUTTON_DONUT', value: config.BUTTON_DONUT },
    { field: 'BUTTON_LIGHTS', value: config.BUTTON_LIGHTS },
    { field: 'BUTTON_BATTERY', value: config.BUTTON_BATTERY }
  ];
  for (const button of buttons) {
    checkInteger(issues, button.field, button.value, BUTTON_INDEX);
  }
  checkDistinct(issues, buttons);
}

function validateRadio(config: BridgeUserConfig, issues: Issues): void {
  checkInteger(issues, 'RADIO_READY_TIMEOUT_MS', config.RADIO_READY_TIMEOUT_MS, { min: 0, max: 60000, recommended: [1000, 10000] });
  checkInteger(issues, 'SCAN_DURATION_MS', config.SCAN_DURATION_MS, { min: 500, max: 60000, recommended: [2000, 10000] });
  checkInteger(issues, 'CONNECT_TIMEOUT_MS', config.CONNECT_TIMEOUT_MS, { min: 1000, max: 120000, recommended: [10000, 60000] });
  checkInteger(issues, 'RECONNECT_BASE_DELAY_MS', config.RECONNECT_BASE_DELAY_MS, { min: 50, max: 60000, recommended: [200, 2000] });
  checkInteger(issues, 'RECONNECT_MAX_DELAY_MS', config.RECONNECT_MAX_DELAY_MS, { min: 50, max: 300000, recommended: [1000, 30000] });
  checkInteger(issues, 'RECONNECT_MAX_ATTEMPTS', config.RECONNECT_MAX_ATTEMPTS, { min: 0, max: 100, recommended: [1, 10] });

  if (config.RECONNECT_MAX_DELAY_MS < config.RECONNECT_BASE_DELAY_MS) {
    fail(issues, 'RECONNECT_MAX_DELAY_MS', 'RECONNECT_MAX_DELAY_MS must be at least RECONNECT_BASE_DELAY_MS');
  }

  checkInteger(issues, 'TELEMETRY_PORT', config.TELEMETRY_PORT, { min: 0, max: 65535 });
  if (config.TELEMETRY_PORT !== 0) {
    checkText(issues, 'TELEMETRY_HOST', config.TELEMETRY_HOST);
  }
}

function validateLogging(config: BridgeUserConfig, issues: Issues): void {
  checkBoolean(issues, 'CONSOLE_ENABLED', config.CONSOLE_ENABLED);
  checkBoolean(issues, 'CONSOLE_COLOR', config.CONSOLE_COLOR);
  checkInteger(issues, 'CONSOLE_LOG_LEVEL', config.CONSOLE_LOG_LEVEL, LOG_LEVEL);
  checkInteger(issues, 'CONSOLE_BUFFER_SIZE', config.CONSOLE_BUFFER_SIZE, { min: 1, max: 10000, recommended: [50, 1000] });
  checkInteger(issues, 'CONSOLE_INTERVAL_MS', config.CONSOLE_INTERVAL_MS, { min: 10, max: 5000, recommended: [20, 500] });

  checkBoolean(issues, 'FILE_LOG_ENABLED', config.FILE_LOG_ENABLED);
  checkInteger(issues, 'FILE_LOG_LEVEL', config.FILE_LOG_LEVEL, LOG_LEVEL);
  if (config.FILE_LOG_ENABLED) {
    checkText(issues, 'FILE_LOG_PATH', config.FILE_LOG_PATH);
  }

  checkInteger(issues, 'GLOBAL_LOG_LEVEL', config.GLOBAL_LOG_LEVEL, LOG_LEVEL);
  checkNumber(issues, 'GLOBAL_LOG_AUTO_DEMOTE_HOURS', config.GLOBAL_LOG_AUTO_DEMOTE_HOURS, { min: 0, max: 720 });

  if (!config.CONSOLE_ENABLED && !config.FILE_LOG_ENABLED) {
    warn(issues, 'CONSOLE_ENABLED', 'All log sinks are disabled');
  }
}

/**
 * Validate user configuration
 * @param config - User settings after overrides
 * @returns Result with errors (fatal) and warnings
 */
export function validateConfig(config: BridgeUserConfig): ValidationResult {
  const issues = createIssues();

  validateControlLoop(config, issues);
  validateInput(config, issues);
  validateRadio(config, issues);
  validateLogging(config, issues);

  return {
    valid: issues.errors.length === 0,
    errors: issues.errors,
    warnings: issues.warnings
  };
}
