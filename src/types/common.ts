/**
 * Common type definitions used throughout the project
 */

/**
 * Index of a physical controller. One slot drives at most one car.
 */
export type ControllerSlotId = number;

/**
 * Signed, normalized axis position in [-1, 1]
 */
export type AxisFraction = number;

/**
 * Drive mode byte understood by the car firmware (1 = normal, 2 = alternate)
 */
export type DriveMode = 1 | 2;

/**
 * Named buttons the sampler tracks.
 * `turbo` is a held flag; the others are edge-detected by the control loop.
 */
export type ButtonName = 'turbo' | 'lights' | 'donut' | 'mode' | 'battery';

/**
 * Pressed state of every tracked button in one sample
 */
export type ButtonFlags = Readonly<Record<ButtonName, boolean>>;

/**
 * Normalized snapshot of one controller, produced once per tick
 */
export interface ControllerState {
  /** Negative = left, positive = right */
  readonly steering: AxisFraction;
  /** Negative = reverse, positive = forward */
  readonly throttle: AxisFraction;
  readonly buttons: ButtonFlags;
}

/**
 * Latched per-session switches, flipped on button press edges
 */
export interface CarToggles {
  readonly mode: DriveMode;
  readonly lights: boolean;
  readonly donut: boolean;
}

/**
 * Fixed-size command payload written to the car on every dispatch
 */
export type CommandFrame = Uint8Array;

/**
 * Entry of the static car catalog
 */
export interface CarModel {
  /** Stable identifier, e.g. "SF24" */
  readonly internalName: string;
  /** Human label, may be empty */
  readonly displayName: string;
  /** Advertised Bluetooth name, or null when the model never advertises */
  readonly bluetoothName: string | null;
}
