/**
 * Controller input helpers
 */

import { isFiniteNumber } from '@utils/number';

import { JS_EVENT } from './types';

import type { RawPadSnapshot } from '$types';
import type { JsEvent, PadState } from './types';

// ═══════════════════════════════════════════════════════════════
// NORMALIZATION
// ═══════════════════════════════════════════════════════════════

/**
 * Snap magnitudes below the dead-zone to exactly 0
 *
 * Values outside the dead-zone pass through unchanged (no rescaling), so a
 * half-deflected stick still reads 0.5.
 *
 * @param value - Raw axis value
 * @param deadzone - Threshold magnitude
 */
export function applyDeadzone(value: number, deadzone: number): number {
  if (value === 0 || Math.abs(value) < deadzone) {
    return 0;
  }
  return value;
}

/**
 * Axis value of a snapshot, or fallback when missing or not finite
 */
export function readAxis(raw: RawPadSnapshot, index: number, fallback = 0): number {
  const value = raw.axes[index];
  return isFiniteNumber(value) ? value : fallback;
}

/**
 * Pressed state of a button, false when the pad has no such button
 */
export function readButton(raw: RawPadSnapshot, index: number): boolean {
  return raw.buttons[index] === true;
}

/**
 * Apply the accelerate/brake buttons over the stick throttle
 * Brake wins when both are held.
 */
export function resolveThrottle(stick: number, accelerate: boolean, brake: boolean): number {
  if (brake) return -1;
  if (accelerate) return 1;
  return stick;
}

// ═══════════════════════════════════════════════════════════════
// JS_EVENT DECODING
// ═══════════════════════════════════════════════════════════════

/**
 * Decode whole js_event records from a chunk
 *
 * @param chunk - Bytes read from the device (may end mid-record)
 * @returns Decoded events and the bytes of a trailing partial record
 */
export function parseJsEvents(chunk: Buffer): { events: JsEvent[]; remainder: Buffer } {
  const events: JsEvent[] = [];
  let offset = 0;

  while (offset + JS_EVENT.SIZE <= chunk.length) {
    const rawType = chunk.readUInt8(offset + 6);
    events.push({
      time: chunk.readUInt32LE(offset),
      value: chunk.readInt16LE(offset + 4),
      type: rawType & ~JS_EVENT.INIT,
      init: (rawType & JS_EVENT.INIT) !== 0,
      number: chunk.readUInt8(offset + 7)
    });
    offset += JS_EVENT.SIZE;
  }

  return { events: events, remainder: chunk.subarray(offset) };
}

/**
 * Fold one event into the pad state
 *
 * Axis values are divided by axisMax, so the raw extreme -32768 lands just
 * below -1; the sampler clamps it.
 */
export function applyJsEvent(state: PadState, event: JsEvent, axisMax: number): void {
  if (event.type === JS_EVENT.AXIS) {
    while (state.axes.length <= event.number) state.axes.push(0);
    state.axes[event.number] = event.value / axisMax;
  } else if (event.type === JS_EVENT.BUTTON) {
    while (state.buttons.length <= event.number) state.buttons.push(false);
    state.buttons[event.number] = event.value !== 0;
  }
}

/**
 * Slot number of a device node name ("js3" -> 3), or null
 */
export function parseSlotName(name: string): number | null {
  const match = /^js(\d+)$/.exec(name);
  return match ? Number(match[1]) : null;
}
