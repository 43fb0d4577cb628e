/**
 * Command frame layout and status report types
 */

/**
 * Bytes in one command frame
 */
export const FRAME_SIZE = 8;

/**
 * Byte offset of each field in the command frame
 * [mode, forward, reverse, left, right, lights, turbo, donut]
 */
export const FRAME_OFFSETS = {
  MODE: 0,
  FORWARD: 1,
  REVERSE: 2,
  LEFT: 3,
  RIGHT: 4,
  LIGHTS: 5,
  TURBO: 6,
  DONUT: 7
} as const;

/**
 * An axis engages its direction byte once its magnitude exceeds this fraction
 */
export const ENGAGE_THRESHOLD = 0.5;

/**
 * Battery level notification (1 byte)
 */
export interface BatteryReport {
  readonly kind: 'battery';
  readonly hex: string;
  readonly batteryPct: number;
}

/**
 * Command echo notification (8 bytes, same layout as the command frame)
 */
export interface EchoReport {
  readonly kind: 'echo';
  readonly hex: string;
  readonly mode: number;
  readonly forward: boolean;
  readonly reverse: boolean;
  readonly left: boolean;
  readonly right: boolean;
  readonly lights: boolean;
  readonly turbo: boolean;
  readonly donut: boolean;
}

/**
 * Notification with an unknown layout
 */
export interface RawReport {
  readonly kind: 'raw';
  readonly hex: string;
  readonly length: number;
}

/**
 * Decoded notification from the car's status characteristic
 */
export type StatusReport = BatteryReport | EchoReport | RawReport;
