/**
 * Control loop helpers
 */

import type { BridgeConfig, ButtonFlags, CarToggles } from '$types';
import type { ButtonEdges, ControlLoopConfig } from './types';

const NO_EDGES: ButtonEdges = Object.freeze({
  turbo: false,
  lights: false,
  donut: false,
  mode: false,
  battery: false
});

/**
 * Buttons pressed since the previous sample
 *
 * @param previous - Previous sample's buttons, null on the first sample
 * @param current - This sample's buttons
 */
export function detectPressEdges(previous: ButtonFlags | null, current: ButtonFlags): ButtonEdges {
  if (previous === null) return NO_EDGES;

  return {
    turbo: current.turbo && !previous.turbo,
    lights: current.lights && !previous.lights,
    donut: current.donut && !previous.donut,
    mode: current.mode && !previous.mode,
    battery: current.battery && !previous.battery
  };
}

/**
 * Flip latched toggles on their press edges
 * @returns The same object when nothing changed
 */
export function applyToggleEdges(toggles: CarToggles, edges: ButtonEdges): CarToggles {
  if (!edges.mode && !edges.lights && !edges.donut) {
    return toggles;
  }

  return Object.freeze<CarToggles>({
    mode: edges.mode ? (toggles.mode === 1 ? 2 : 1) : toggles.mode,
    lights: edges.lights ? !toggles.lights : toggles.lights,
    donut: edges.donut ? !toggles.donut : toggles.donut
  });
}

/**
 * Human-readable list of toggle changes ("lights on, mode 2")
 */
export function describeToggleChange(before: CarToggles, after: CarToggles): string {
  const parts: string[] = [];
  if (before.mode !== after.mode) parts.push('mode ' + after.mode);
  if (before.lights !== after.lights) parts.push('lights ' + (after.lights ? 'on' : 'off'));
  if (before.donut !== after.donut) parts.push('donut ' + (after.donut ? 'on' : 'off'));
  return parts.join(', ');
}

/**
 * Delay before the next reconnect attempt
 *
 * Doubles from base after each failed attempt, capped at max:
 * attempt 1 -> base, 2 -> 2 * base, 3 -> 4 * base, ...
 *
 * @param attempt - Number of attempts already made (>= 1)
 */
export function computeBackoffDelay(attempt: number, baseMs: number, maxMs: number): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(maxMs, baseMs * Math.pow(2, exponent));
}

/**
 * Build the loop settings from the bridge configuration
 */
export function toControlLoopConfig(config: BridgeConfig): ControlLoopConfig {
  return {
    tickPeriodMs: config.TICK_PERIOD_MS,
    keepaliveMs: config.KEEPALIVE_MS,
    telemetryIntervalMs: config.TELEMETRY_INTERVAL_MS,
    reconnectBaseDelayMs: config.RECONNECT_BASE_DELAY_MS,
    reconnectMaxDelayMs: config.RECONNECT_MAX_DELAY_MS,
    reconnectMaxAttempts: config.RECONNECT_MAX_ATTEMPTS
  };
}
