/**
 * Command codec
 *
 * Translates a normalized controller state plus the session's latched
 * toggles into the car's 8-byte command frame, and decodes notifications
 * coming back on the status characteristic. Pure and deterministic.
 */

import { assertAxis, directionBytes, frameToHex } from './helpers';
import { FRAME_OFFSETS, FRAME_SIZE } from './types';

import type { CarToggles, CommandFrame, ControllerState } from '$types/common';
import type { StatusReport } from './types';

/**
 * Toggles of a fresh session: normal mode, lights off, donut off
 */
export const DEFAULT_TOGGLES: CarToggles = Object.freeze<CarToggles>({ mode: 1, lights: false, donut: false });

/**
 * Write the frame for state and toggles into target
 *
 * @param target - Buffer of at least FRAME_SIZE bytes; bytes 0..7 are overwritten
 * @param state - Normalized controller state
 * @param toggles - Latched session toggles
 * @throws {InvalidInputError} When an axis is NaN, infinite or outside [-1, 1]
 */
export function encodeInto(target: Uint8Array, state: ControllerState, toggles: CarToggles): void {
  assertAxis(state.steering, 'steering');
  assertAxis(state.throttle, 'throttle');

  const throttle = directionBytes(state.throttle);
  const steering = directionBytes(state.steering);

  target[FRAME_OFFSETS.MODE] = toggles.mode & 0xff;
  target[FRAME_OFFSETS.FORWARD] = throttle[1];
  target[FRAME_OFFSETS.REVERSE] = throttle[0];
  target[FRAME_OFFSETS.LEFT] = steering[0];
  target[FRAME_OFFSETS.RIGHT] = steering[1];
  target[FRAME_OFFSETS.LIGHTS] = toggles.lights ? 1 : 0;
  target[FRAME_OFFSETS.TURBO] = state.buttons.turbo ? 1 : 0;
  target[FRAME_OFFSETS.DONUT] = toggles.donut ? 1 : 0;
}

/**
 * Encode a controller state into a fresh command frame
 *
 * @param state - Normalized controller state
 * @param toggles - Latched session toggles (defaults to DEFAULT_TOGGLES)
 * @returns New 8-byte frame
 * @throws {InvalidInputError} When an axis is NaN, infinite or outside [-1, 1]
 *
 * @example
 * ```typescript
 * const frame = encode({ steering: -0.8, throttle: 1, buttons: NO_BUTTONS });
 * frameToHex(frame); // "01 01 00 01 00 00 00 00"
 * ```
 */
export function encode(state: ControllerState, toggles: CarToggles = DEFAULT_TOGGLES): CommandFrame {
  const frame = new Uint8Array(FRAME_SIZE);
  encodeInto(frame, state, toggles);
  return frame;
}

/**
 * Decode a status notification
 *
 * One byte is a battery percentage, eight bytes echo the command layout,
 * anything else is kept as raw hex.
 */
export function decodeStatus(bytes: Uint8Array): StatusReport {
  const hex = frameToHex(bytes);

  if (bytes.length === 1) {
    return { kind: 'battery', hex: hex, batteryPct: bytes[0] };
  }

  if (bytes.length === FRAME_SIZE) {
    return {
      kind: 'echo',
      hex: hex,
      mode: bytes[FRAME_OFFSETS.MODE],
      forward: bytes[FRAME_OFFSETS.FORWARD] !== 0,
      reverse: bytes[FRAME_OFFSETS.REVERSE] !== 0,
      left: bytes[FRAME_OFFSETS.LEFT] !== 0,
      right: bytes[FRAME_OFFSETS.RIGHT] !== 0,
      lights: bytes[FRAME_OFFSETS.LIGHTS] !== 0,
      turbo: bytes[FRAME_OFFSETS.TURBO] !== 0,
      donut: bytes[FRAME_OFFSETS.DONUT] !== 0
    };
  }

  return { kind: 'raw', hex: hex, length: bytes.length };
}

/**
 * One-line summary of a status report for logs and displays
 */
export function describeStatus(report: StatusReport): string {
  switch (report.kind) {
    case 'battery':
      return 'battery ' + report.batteryPct + '%';
    case 'echo':
      return 'echo mode=' + report.mode +
        ' fwd=' + flag(report.forward) + ' rev=' + flag(report.reverse) +
        ' left=' + flag(report.left) + ' right=' + flag(report.right) +
        ' lights=' + flag(report.lights) + ' turbo=' + flag(report.turbo) +
        ' donut=' + flag(report.donut);
    case 'raw':
      return 'raw ' + report.length + 'B [' + report.hex + ']';
  }
}

function flag(value: boolean): string {
  return value ? '1' : '0';
}
