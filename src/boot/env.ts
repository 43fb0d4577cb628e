/**
 * Environment overrides
 *
 * Reads BRIDGE_* variables (optionally from a .env file) into partial
 * configuration. Values that fail to parse are reported, never guessed.
 */

import { resolve } from 'node:path';

import * as dotenv from 'dotenv';

import { parseLogLevel } from '@logging';

import type { BridgeConfigOverrides } from '$types';

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Overrides plus the variables that could not be parsed
 */
export interface EnvOverrides {
  overrides: BridgeConfigOverrides;
  problems: string[];
}

/**
 * Load a .env file into process.env (existing variables win)
 * @param file - Path to the .env file, relative to the working directory
 * @returns True when the file was read
 */
export function loadDotenv(file: string): boolean {
  const result = dotenv.config({ path: resolve(file), override: false });
  return result.error === undefined;
}

function readNumber(env: Env, name: string, problems: string[]): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    problems.push(name + ' must be a number (got "' + raw + '")');
    return undefined;
  }
  return value;
}

function readBoolean(env: Env, name: string, problems: string[]): boolean | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;

  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
    case 'on':
      return true;
    case 'false':
    case '0':
    case 'no':
    case 'off':
      return false;
    default:
      problems.push(name + ' must be true or false (got "' + raw + '")');
      return undefined;
  }
}

/**
 * Parse BRIDGE_* variables into configuration overrides
 *
 * | Variable                      | Setting                               |
 * |-------------------------------|---------------------------------------|
 * | BRIDGE_SLOT                   | CONTROLLER_SLOT                       |
 * | BRIDGE_JOYSTICK_DIR           | JOYSTICK_DEVICE_DIR                   |
 * | BRIDGE_DEADZONE               | DEADZONE                              |
 * | BRIDGE_TICK_MS                | TICK_PERIOD_MS                        |
 * | BRIDGE_KEEPALIVE_MS           | KEEPALIVE_MS                          |
 * | BRIDGE_SCAN_MS                | SCAN_DURATION_MS                      |
 * | BRIDGE_CONNECT_TIMEOUT_MS     | CONNECT_TIMEOUT_MS                    |
 * | BRIDGE_RECONNECT_ATTEMPTS     | RECONNECT_MAX_ATTEMPTS                |
 * | BRIDGE_TELEMETRY_PORT         | TELEMETRY_PORT                        |
 * | BRIDGE_TELEMETRY_HOST         | TELEMETRY_HOST                        |
 * | BRIDGE_LOG_LEVEL              | GLOBAL_LOG_LEVEL and CONSOLE_LOG_LEVEL |
 * | BRIDGE_LOG_FILE               | FILE_LOG_PATH (enables the file sink) |
 * | BRIDGE_COLOR                  | CONSOLE_COLOR                         |
 *
 * @param env - Variables to read (usually process.env)
 */
export function readEnvOverrides(env: Env): EnvOverrides {
  const overrides: BridgeConfigOverrides = {};
  const problems: string[] = [];

  const slot = readNumber(env, 'BRIDGE_SLOT', problems);
  if (slot !== undefined) overrides.CONTROLLER_SLOT = slot;

  const joystickDir = env.BRIDGE_JOYSTICK_DIR;
  if (joystickDir !== undefined && joystickDir.trim() !== '') overrides.JOYSTICK_DEVICE_DIR = joystickDir.trim();

  const deadzone = readNumber(env, 'BRIDGE_DEADZONE', problems);
  if (deadzone !== undefined) overrides.DEADZONE = deadzone;

  const tick = readNumber(env, 'BRIDGE_TICK_MS', problems);
  if (tick !== undefined) overrides.TICK_PERIOD_MS = tick;

  const keepalive = readNumber(env, 'BRIDGE_KEEPALIVE_MS', problems);
  if (keepalive !== undefined) overrides.KEEPALIVE_MS = keepalive;

  const scan = readNumber(env, 'BRIDGE_SCAN_MS', problems);
  if (scan !== undefined) overrides.SCAN_DURATION_MS = scan;

  const connectTimeout = readNumber(env, 'BRIDGE_CONNECT_TIMEOUT_MS', problems);
  if (connectTimeout !== undefined) overrides.CONNECT_TIMEOUT_MS = connectTimeout;

  const attempts = readNumber(env, 'BRIDGE_RECONNECT_ATTEMPTS', problems);
  if (attempts !== undefined) overrides.RECONNECT_MAX_ATTEMPTS = attempts;

  const port = readNumber(env, 'BRIDGE_TELEMETRY_PORT', problems);
  if (port !== undefined) overrides.TELEMETRY_PORT = port;

  const host = env.BRIDGE_TELEMETRY_HOST;
  if (host !== undefined && host.trim() !== '') overrides.TELEMETRY_HOST = host.trim();

  const rawLevel = env.BRIDGE_LOG_LEVEL;
  if (rawLevel !== undefined && rawLevel.trim() !== '') {
    const level = parseLogLevel(rawLevel);
    if (level === null) {
      problems.push('BRIDGE_LOG_LEVEL must be debug, info, warning or critical (got "' + rawLevel + '")');
    } else {
      overrides.GLOBAL_LOG_LEVEL = level;
      overrides.CONSOLE_LOG_LEVEL = level;
    }
  }

  const logFile = env.BRIDGE_LOG_FILE;
  if (logFile !== undefined && logFile.trim() !== '') {
    overrides.FILE_LOG_ENABLED = true;
    overrides.FILE_LOG_PATH = logFile.trim();
  }

  const color = readBoolean(env, 'BRIDGE_COLOR', problems);
  if (color !== undefined) overrides.CONSOLE_COLOR = color;

  return { overrides: overrides, problems: problems };
}
