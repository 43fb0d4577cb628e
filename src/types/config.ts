/**
 * Type definition for the bridge configuration
 */

import type { LogLevel, LogLevels } from '@logging';

/**
 * User-configurable settings
 * Everything a user might reasonably tune for driving feel, pairing and observability
 */
export interface BridgeUserConfig {
  // ───────── CONTROL LOOP ─────────
  readonly TICK_PERIOD_MS: number;
  readonly KEEPALIVE_MS: number;
  readonly TELEMETRY_INTERVAL_MS: number;

  // ───────── CONTROLLER INPUT ─────────
  readonly CONTROLLER_SLOT: number;
  readonly JOYSTICK_DEVICE_DIR: string;
  readonly DEADZONE: number;
  readonly STEERING_AXIS: number;
  readonly THROTTLE_AXIS: number;
  readonly INVERT_STEERING: boolean;
  readonly INVERT_THROTTLE: boolean;
  readonly TURBO_AXES: readonly number[];
  readonly TRIGGER_PRESS_THRESHOLD: number;

  // ───────── BUTTON MAP ─────────
  readonly BUTTON_ACCELERATE: number;
  readonly BUTTON_BRAKE: number;
  readonly BUTTON_MODE: number;
  readonly BUTTON_DONUT: number;
  readonly BUTTON_LIGHTS: number;
  readonly BUTTON_BATTERY: number;

  // ───────── RADIO & PAIRING ─────────
  readonly RADIO_READY_TIMEOUT_MS: number;
  readonly SCAN_DURATION_MS: number;
  readonly CONNECT_TIMEOUT_MS: number;
  readonly RECONNECT_BASE_DELAY_MS: number;
  readonly RECONNECT_MAX_DELAY_MS: number;
  readonly RECONNECT_MAX_ATTEMPTS: number;

  // ───────── TELEMETRY FEED ─────────
  readonly TELEMETRY_PORT: number;
  readonly TELEMETRY_HOST: string;

  // ───────── CONSOLE SETTINGS ─────────
  readonly CONSOLE_ENABLED: boolean;
  readonly CONSOLE_LOG_LEVEL: LogLevel;
  readonly CONSOLE_BUFFER_SIZE: number;
  readonly CONSOLE_INTERVAL_MS: number;
  readonly CONSOLE_COLOR: boolean;

  // ───────── FILE LOG SETTINGS ─────────
  readonly FILE_LOG_ENABLED: boolean;
  readonly FILE_LOG_LEVEL: LogLevel;
  readonly FILE_LOG_PATH: string;

  // ───────── GLOBAL LOGGING SETTINGS ─────────
  readonly GLOBAL_LOG_LEVEL: LogLevel;
  readonly GLOBAL_LOG_AUTO_DEMOTE_HOURS: number;
}

/**
 * Partial user settings coming from the environment or CLI flags
 */
export type BridgeConfigOverrides = {
  -readonly [K in keyof BridgeUserConfig]?: BridgeUserConfig[K];
};

/**
 * Application constants
 * Protocol and engine constants that should rarely change
 */
export interface BridgeAppConstants {
  // ───────── LOGGING CONSTANTS ─────────
  readonly LOG_LEVELS: LogLevels;

  // ───────── GATT PROTOCOL ─────────
  readonly CONTROL_SERVICE_UUID: string;
  readonly COMMAND_CHARACTERISTIC_UUID: string;
  readonly STATUS_CHARACTERISTIC_UUID: string;
  readonly BATTERY_SERVICE_UUID: string;
  readonly BATTERY_CHARACTERISTIC_UUID: string;

  // ───────── CONTROLLER DRIVER ─────────
  readonly JOYSTICK_AXIS_MAX: number;
  readonly JOYSTICK_NAME_ROOT: string;

  // ───────── SHUTDOWN ─────────
  readonly SHUTDOWN_GRACE_MS: number;
}

/**
 * Complete bridge configuration
 * Combines user config and app constants
 */
export type BridgeConfig = BridgeUserConfig & BridgeAppConstants;
