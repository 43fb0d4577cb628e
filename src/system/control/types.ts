/**
 * Control module type definitions
 */

import type { ButtonName, ControllerSlotId, TimerAPI } from '$types';
import type { Telemetry } from '@events/types';
import type { InputSampler } from '@hardware/gamepad/types';
import type { LinkManager } from '@hardware/radio/types';
import type { Logger } from '@logging';

/**
 * What one tick did
 */
export type TickOutcome =
  | 'sent'          // frame written
  | 'skipped'       // rate limiter held an unchanged frame
  | 'no-input'      // controller slot empty
  | 'dropped'       // write refused or failed
  | 'reconnecting'  // a reconnect attempt ran
  | 'waiting'       // connecting, or backing off between attempts
  | 'idle';         // cancelled, or failed and waiting for retry()

/**
 * Buttons that act on their press edge
 */
export type ButtonEdges = Readonly<Record<ButtonName, boolean>>;

/**
 * Loop timing and recovery settings
 */
export interface ControlLoopConfig {
  tickPeriodMs: number;
  keepaliveMs: number;
  telemetryIntervalMs: number;
  reconnectBaseDelayMs: number;
  reconnectMaxDelayMs: number;
  reconnectMaxAttempts: number;
}

/**
 * Everything one session's loop drives
 */
export interface ControlLoopDependencies {
  slot: ControllerSlotId;
  sampler: InputSampler;
  link: LinkManager;
  timer: TimerAPI;
  logger: Logger;
  config: ControlLoopConfig;
  /** Monotonic milliseconds */
  clock: () => number;
  onTelemetry?: (telemetry: Telemetry) => void;
}

/**
 * Per-session fixed-cadence loop
 */
export interface ControlLoop {
  start(): void;
  /** Stop ticking, send a neutral frame, disconnect and release the slot */
  stop(): Promise<void>;
  /** Run one tick (start() schedules these) */
  tick(): Promise<TickOutcome>;
  /** Restart reconnection after the attempts ran out or a failed connect */
  retry(): void;
  isRunning(): boolean;
  getTelemetry(): Telemetry;
}
