#!/usr/bin/env tsx
/**
 * Gamepad Car Bridge CLI
 * List models and controllers, scan for cars, and drive them
 */

import { createInterface } from 'node:readline/promises';

import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';

import { resolveConfig } from './config';
import { loadDotenv, readEnvOverrides } from './env';
import { BRIDGE_VERSION, initialize } from './init';
import {
  formatController,
  formatDevice,
  formatModel,
  formatScanUnavailable,
  parseChoice,
  parseTargets,
  planDrive
} from './commands';
import { listModels } from '@core/catalog';
import { createJoystickDriver, NODE_JOYSTICK_FS } from '@hardware/gamepad';
import { createNobleRadio } from '@hardware/radio';
import { createBridge } from '@system/bridge';
import { createTelemetryServer } from '@telemetry';
import { ScanUnavailableError } from '$types';

import type { BridgeConfig, BridgeConfigOverrides, GamepadAPI } from '$types';
import type { DiscoveredDevice } from '@hardware/radio/types';
import type { Logger } from '@logging';
import type { Bridge } from '@system/bridge';
import type { TelemetryServer } from '@telemetry';
import type { DrivePair } from './commands';
import type { Runtime } from './types';

interface GlobalOptions {
  env: string;
  verbose?: boolean;
}

interface ScanOptions {
  duration?: number;
}

interface DriveOptions {
  slot?: number;
  duration?: number;
  telemetryPort?: number;
}

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

/**
 * Environment overrides, with problems printed as warnings
 */
function envOverrides(program: Command): BridgeConfigOverrides {
  const globals = program.opts<GlobalOptions>();
  loadDotenv(globals.env);

  const env = readEnvOverrides(process.env);
  env.problems.forEach(function (problem) {
    console.error(chalk.yellow('⚠️ ' + problem));
  });

  const overrides: BridgeConfigOverrides = Object.assign({}, env.overrides);
  if (globals.verbose) {
    overrides.GLOBAL_LOG_LEVEL = 0;
    overrides.CONSOLE_LOG_LEVEL = 0;
  }
  return overrides;
}

async function boot(program: Command, extra: BridgeConfigOverrides): Promise<Runtime> {
  const runtime = await initialize(Object.assign(envOverrides(program), extra));
  if (runtime === null) {
    process.exit(1);
  }
  return runtime;
}

function joystickDriver(config: Readonly<BridgeConfig>, logger?: Logger): GamepadAPI {
  return createJoystickDriver({
    deviceDir: config.JOYSTICK_DEVICE_DIR,
    nameRoot: config.JOYSTICK_NAME_ROOT,
    axisMax: config.JOYSTICK_AXIS_MAX
  }, NODE_JOYSTICK_FS, logger);
}

function buildBridge(runtime: Runtime): Bridge {
  const logger = runtime.logger;
  return createBridge({
    radio: createNobleRadio(runtime.timer, logger.scope('radio')),
    gamepad: joystickDriver(runtime.config, logger.scope('gamepad')),
    timer: runtime.timer,
    logger: logger,
    config: runtime.config
  });
}

/**
 * Run a scan, explaining a refused radio instead of failing
 * @returns The devices found, or null when the radio could not scan
 */
async function scanOrExplain(bridge: Bridge, onDevice: (device: DiscoveredDevice) => void): Promise<DiscoveredDevice[] | null> {
  try {
    return await bridge.startScan(onDevice);
  } catch (err) {
    if (!(err instanceof ScanUnavailableError)) throw err;
    const lines = formatScanUnavailable(err);
    console.error(chalk.red(lines[0]));
    console.error(chalk.yellow(lines[1]));
    process.exitCode = 1;
    return null;
  }
}

/**
 * Print the scan results and ask for one
 * @returns The chosen car, or null when signal aborted the prompt
 */
async function chooseDevice(devices: readonly DiscoveredDevice[], signal: AbortSignal): Promise<DiscoveredDevice | null> {
  console.log(chalk.bold('Several cars found:'));
  devices.forEach(function (device, i) {
    console.log('  ' + formatDevice(device, i + 1));
  });

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    for (;;) {
      const answer = await rl.question('Choose a car [1-' + devices.length + ']: ', { signal: signal });
      const index = parseChoice(answer, devices.length);
      if (index !== null) return devices[index];
      console.log(chalk.yellow('Enter a number from the list'));
    }
  } catch (err) {
    if (signal.aborted) return null;
    throw err;
  } finally {
    rl.close();
  }
}

// ═══════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════

function listModelsCommand(): void {
  listModels().forEach(function (model) {
    console.log(formatModel(model));
  });
}

function listControllersCommand(program: Command): void {
  const config = resolveConfig(envOverrides(program));
  const driver = joystickDriver(config);

  try {
    const slots = driver.listSlots();
    if (slots.length === 0) {
      console.log(chalk.yellow('No controllers found in ' + config.JOYSTICK_DEVICE_DIR));
    }
    slots.forEach(function (info) {
      console.log(formatController(info));
    });
  } finally {
    driver.close();
  }
}

async function scanCommand(program: Command, options: ScanOptions): Promise<void> {
  const extra: BridgeConfigOverrides = {};
  if (options.duration !== undefined) extra.SCAN_DURATION_MS = options.duration;

  const runtime = await boot(program, extra);
  const bridge = buildBridge(runtime);

  function cancel(): void {
    bridge.cancelScan();
  }
  process.once('SIGINT', cancel);
  process.once('SIGTERM', cancel);

  try {
    const devices = await scanOrExplain(bridge, function (device) {
      console.log(formatDevice(device));
    });
    if (devices === null) return;
    runtime.logger.info('Scan finished: ' + devices.length + ' car(s)');
  } finally {
    process.removeListener('SIGINT', cancel);
    process.removeListener('SIGTERM', cancel);
    await bridge.shutdown();
    await runtime.logger.close();
  }
}

async function driveCommand(program: Command, args: string[], options: DriveOptions): Promise<void> {
  const extra: BridgeConfigOverrides = {};
  if (options.slot !== undefined) extra.CONTROLLER_SLOT = options.slot;
  if (options.telemetryPort !== undefined) extra.TELEMETRY_PORT = options.telemetryPort;

  const runtime = await boot(program, extra);
  const config = runtime.config;
  const logger = runtime.logger;
  const targets = parseTargets(args, config.CONTROLLER_SLOT);

  const bridge = buildBridge(runtime);
  const aborter = new AbortController();
  let feed: TelemetryServer | null = null;

  let resolveStopped: (reason: string) => void = function () {};
  const stopped = new Promise<string>(function (resolve) {
    resolveStopped = resolve;
  });

  function requestStop(reason: string): void {
    aborter.abort();
    bridge.cancelScan();
    resolveStopped(reason);
  }
  function onSigint(): void { requestStop('SIGINT'); }
  function onSigterm(): void { requestStop('SIGTERM'); }
  process.once('SIGINT', onSigint);
  process.once('SIGTERM', onSigterm);

  try {
    if (config.TELEMETRY_PORT > 0) {
      feed = createTelemetryServer({ port: config.TELEMETRY_PORT, host: config.TELEMETRY_HOST }, {
        logger: logger.scope('feed')
      });
      await feed.start();
      feed.attach(bridge);
    }

    const devices = await scanOrExplain(bridge, function (device) {
      logger.info('Found ' + formatDevice(device));
    });
    if (devices === null || aborter.signal.aborted) return;

    const plan = planDrive(devices, targets, config.CONTROLLER_SLOT);
    let pairs: DrivePair[] = [];
    if (plan.kind === 'drive') {
      pairs = plan.pairs;
    } else {
      const chosen = await chooseDevice(plan.devices, aborter.signal);
      if (chosen === null) return;
      pairs = [{ slot: config.CONTROLLER_SLOT, device: chosen }];
    }

    for (const pair of pairs) {
      if (aborter.signal.aborted) return;
      const session = await bridge.connect(pair.device, pair.slot, aborter.signal);
      logger.info('Session ' + session.id + ' is ' + session.getStatus());
    }

    if (options.duration !== undefined) {
      runtime.timer.set(options.duration, false, function () {
        requestStop('duration elapsed');
      });
    }

    const reason = await stopped;
    logger.info('Stopping (' + reason + ')');
  } finally {
    process.removeListener('SIGINT', onSigint);
    process.removeListener('SIGTERM', onSigterm);
    await bridge.shutdown();
    if (feed !== null) {
      await feed.close();
    }
    await logger.close();
  }
}

// ═══════════════════════════════════════════════════════════════
// PROGRAM
// ═══════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('car-bridge')
  .description('Drive Bluetooth LE racing cars from a game controller')
  .version(BRIDGE_VERSION)
  .option('-e, --env <file>', 'Read BRIDGE_* variables from this file', '.env')
  .option('-v, --verbose', 'Log debug messages');

program
  .command('models')
  .description('List the car models the bridge knows')
  .action(listModelsCommand);

program
  .command('controllers')
  .description('List attached game controllers')
  .action(function () {
    listControllersCommand(program);
  });

program
  .command('scan')
  .description('Scan for supported cars')
  .option('-d, --duration <ms>', 'Scan window in milliseconds', parseInteger)
  .action(function (options: ScanOptions) {
    return scanCommand(program, options);
  });

program
  .command('drive')
  .description('Drive cars; targets are slot=address pairs or a bare address')
  .argument('[targets...]', 'Cars to drive (default: the single car found)')
  .option('-s, --slot <n>', 'Controller slot for targets without one', parseInteger)
  .option('-d, --duration <ms>', 'Stop after this many milliseconds', parseInteger)
  .option('-t, --telemetry-port <port>', 'Serve the telemetry feed on this port (0 disables)', parseInteger)
  .action(function (targets: string[], options: DriveOptions) {
    return driveCommand(program, targets, options);
  });

program.parseAsync(process.argv).then(function () {
  process.exit(process.exitCode || 0);
}, function (err: unknown) {
  console.error(chalk.red('Error: ' + (err instanceof Error ? err.message : String(err))));
  process.exit(1);
});
