/**
 * Bridge initialization
 *
 * Validates the configuration first and prints errors straight to the
 * console, since no logger exists yet. Then builds the sinks and the
 * logger, and only logs through the logger from there on.
 */

import { resolveConfig } from './config';
import { createConsoleSink, createFileSink, createLogger } from '@logging';
import { createNodeTimer, now } from '@utils/time';
import { validateConfig } from '@validation';

import type { BridgeConfigOverrides } from '$types';
import type { SinkWithLevel } from '@logging';
import type { InitDependencies, Runtime } from './types';

export const BRIDGE_VERSION = '1.0.0';

/**
 * Build the runtime
 *
 * @param overrides - Settings from the environment and CLI flags
 * @param deps - Console and timers (Node defaults)
 * @returns The runtime, or null when the configuration is invalid
 */
export async function initialize(
  overrides: BridgeConfigOverrides = {},
  deps: InitDependencies = {}
): Promise<Runtime | null> {
  const out = deps.console || console;
  const config = resolveConfig(overrides);

  // Validate configuration
  const validation = validateConfig(config);

  if (!validation.valid) {
    out.error('INIT FAIL: Invalid configuration');
    validation.errors.forEach(function (err) {
      out.error('  [' + err.field + ']: ' + err.message);
    });
    return null;
  }

  const timer = deps.timer || createNodeTimer(false);
  const sinkTimer = deps.sinkTimer || createNodeTimer(true);

  // Setup logging
  const sinks: SinkWithLevel[] = [];
  if (config.CONSOLE_ENABLED) {
    const consoleSink = createConsoleSink({ timer: sinkTimer, console: out }, {
      bufferSize: config.CONSOLE_BUFFER_SIZE,
      drainInterval: config.CONSOLE_INTERVAL_MS,
      color: config.CONSOLE_COLOR
    });
    sinks.push({ sink: consoleSink, minLevel: config.CONSOLE_LOG_LEVEL });
  }
  if (config.FILE_LOG_ENABLED) {
    const fileSink = createFileSink({ path: config.FILE_LOG_PATH }, {
      onError: function (message: string) { out.warn(message); }
    });
    sinks.push({ sink: fileSink, minLevel: config.FILE_LOG_LEVEL });
  }

  const logger = createLogger({
    level: config.GLOBAL_LOG_LEVEL,
    demoteHours: config.GLOBAL_LOG_AUTO_DEMOTE_HOURS
  }, {
    timeSource: now,
    sinks: sinks,
    onSinkError: function (message: string) { out.warn(message); }
  }, config.LOG_LEVELS);

  const messages = await logger.initialize();

  // Startup message first
  logger.info('🚗 Gamepad car bridge v' + BRIDGE_VERSION);
  logger.info('⏱️ Tick ' + config.TICK_PERIOD_MS + ' ms | keep-alive ' + config.KEEPALIVE_MS +
    ' ms | dead-zone ' + config.DEADZONE + ' | reconnect ' + config.RECONNECT_MAX_ATTEMPTS + 'x');

  // Sink init problems after the title, straight to the console
  for (let i = 0; i < messages.length; i++) {
    if (!messages[i].success) {
      out.log('⚠️ [WARNING]  ' + messages[i].message);
    }
  }

  validation.warnings.forEach(function (warn) {
    logger.warning('[' + warn.field + ']: ' + warn.message);
  });

  return {
    config: config,
    logger: logger,
    timer: timer,
    isDebug: config.GLOBAL_LOG_LEVEL <= config.LOG_LEVELS.DEBUG
  };
}
