/**
 * Boot type definitions
 */

import type { BridgeConfig, TimerAPI } from '$types';
import type { ConsoleAPI, RootLogger } from '@logging';

/**
 * Process-wide handles created at start-up
 */
export interface Runtime {
  config: Readonly<BridgeConfig>;
  logger: RootLogger;
  timer: TimerAPI;
  isDebug: boolean;
}

/**
 * Console used before the logger exists
 */
export interface BootConsole extends ConsoleAPI {
  error(message: string): void;
}

/**
 * Start-up dependencies (Node defaults when omitted)
 */
export interface InitDependencies {
  console?: BootConsole;
  /** Timer for the control loops; keeps the process alive */
  timer?: TimerAPI;
  /** Timer for sink housekeeping; should not keep the process alive */
  sinkTimer?: TimerAPI;
}
