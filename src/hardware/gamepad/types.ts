/**
 * Controller input type definitions
 */

import type { Readable } from 'node:stream';
import type { ControllerSlotId, ControllerSlotInfo, ControllerState } from '$types';

// ═══════════════════════════════════════════════════════════════
// SAMPLER
// ═══════════════════════════════════════════════════════════════

/**
 * Button indices for the actions the bridge understands
 */
export interface ButtonMap {
  accelerate: number;
  brake: number;
  mode: number;
  donut: number;
  lights: number;
  battery: number;
}

/**
 * How raw axes and buttons become a ControllerState
 */
export interface SamplerConfig {
  deadzone: number;
  steeringAxis: number;
  throttleAxis: number;
  invertSteering: boolean;
  invertThrottle: boolean;
  /** Trigger axes; turbo is held while any is above triggerPressThreshold */
  turboAxes: readonly number[];
  triggerPressThreshold: number;
  buttons: ButtonMap;
}

/**
 * Normalizing reader over a GamepadAPI
 */
export interface InputSampler {
  /** Read and normalize the slot; throws ControllerUnavailableError when empty */
  sample(slot: ControllerSlotId): ControllerState;
  listSlots(): ControllerSlotInfo[];
  release(slot: ControllerSlotId): void;
}

// ═══════════════════════════════════════════════════════════════
// LINUX JOYSTICK DRIVER
// ═══════════════════════════════════════════════════════════════

/**
 * js_event record layout and type flags (linux/joystick.h)
 */
export const JS_EVENT = {
  SIZE: 8,
  BUTTON: 0x01,
  AXIS: 0x02,
  INIT: 0x80
} as const;

/**
 * One decoded js_event
 */
export interface JsEvent {
  /** Driver timestamp (ms, wraps) */
  time: number;
  value: number;
  /** Event type with the INIT flag stripped */
  type: number;
  /** True for the synthetic events sent right after open */
  init: boolean;
  /** Axis or button index */
  number: number;
}

/**
 * Latest known state of one joystick device
 */
export interface PadState {
  axes: number[];
  buttons: boolean[];
}

/**
 * File system access used by the driver
 */
export interface JoystickFs {
  /** Entries of a directory, empty when it does not exist */
  list(dir: string): string[];
  exists(path: string): boolean;
  /** Whether the process may open path for reading */
  readable(path: string): boolean;
  /** File contents, or null when missing */
  readText(path: string): string | null;
  /** Open a device node for streaming reads */
  open(path: string): Readable;
}

/**
 * Driver configuration
 */
export interface JoystickDriverConfig {
  /** Directory with jsN nodes */
  deviceDir: string;
  /** sysfs root with jsN/device/name files */
  nameRoot: string;
  /** Full-scale raw axis value */
  axisMax: number;
}
