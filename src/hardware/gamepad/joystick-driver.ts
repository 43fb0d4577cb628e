/**
 * Linux joystick driver
 *
 * Streams js_event records from /dev/input/jsN and keeps the latest axis and
 * button values per slot. A slot is opened lazily on first read and reopened
 * after the device goes away and comes back. A node that cannot be read is
 * retried only every REOPEN_BACKOFF_READS reads.
 */

import { accessSync, constants, createReadStream, existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

import { applyJsEvent, parseJsEvents, parseSlotName } from './helpers';
import { JS_EVENT } from './types';

import type { Readable } from 'node:stream';
import type { ControllerSlotId, ControllerSlotInfo, GamepadAPI, RawPadSnapshot } from '$types';
import type { Logger } from '@logging';
import type { JoystickDriverConfig, JoystickFs, PadState } from './types';

// ═══════════════════════════════════════════════════════════════
// FILE SYSTEM ACCESS
// ═══════════════════════════════════════════════════════════════

/**
 * Node file system backend
 */
export const NODE_JOYSTICK_FS: JoystickFs = {
  list: function (dir: string): string[] {
    if (!existsSync(dir)) return [];
    return readdirSync(dir);
  },
  exists: existsSync,
  readable: function (path: string): boolean {
    try {
      accessSync(path, constants.R_OK);
      return true;
    } catch {
      return false;
    }
  },
  readText: function (path: string): string | null {
    if (!existsSync(path)) return null;
    return readFileSync(path, 'utf8');
  },
  open: function (path: string): Readable {
    return createReadStream(path, { highWaterMark: JS_EVENT.SIZE * 64 });
  }
};

// ═══════════════════════════════════════════════════════════════
// DRIVER
// ═══════════════════════════════════════════════════════════════

/** Reads skipped after a failed open before the next attempt */
export const REOPEN_BACKOFF_READS = 20;

interface OpenPad {
  slot: ControllerSlotId;
  path: string;
  stream: Readable;
  state: PadState;
  remainder: Buffer;
  active: boolean;
  /** Set once the first chunk arrived */
  received: boolean;
}

interface SlotTrouble {
  failures: number;
  skip: number;
}

/**
 * Create a GamepadAPI backed by the Linux joystick interface
 *
 * @param config - Device locations and axis scale
 * @param fs - File system access
 * @param logger - Optional logger for device open/loss messages
 */
export function createJoystickDriver(
  config: JoystickDriverConfig,
  fs: JoystickFs = NODE_JOYSTICK_FS,
  logger?: Logger
): GamepadAPI {
  const pads = new Map<ControllerSlotId, OpenPad>();
  const troubles = new Map<ControllerSlotId, SlotTrouble>();

  function devicePath(slot: ControllerSlotId): string {
    return join(config.deviceDir, 'js' + slot);
  }

  function deviceName(slot: ControllerSlotId): string {
    const text = fs.readText(join(config.nameRoot, 'js' + slot, 'device', 'name'));
    const name = text === null ? '' : text.trim();
    return name.length > 0 ? name : 'Joystick ' + slot;
  }

  // Warns on the first failure of a streak only
  function noteFailure(slot: ControllerSlotId, message: string): void {
    const trouble = troubles.get(slot) || { failures: 0, skip: 0 };
    trouble.failures++;
    trouble.skip = REOPEN_BACKOFF_READS;
    troubles.set(slot, trouble);

    if (!logger) return;
    if (trouble.failures === 1) logger.warning(message);
    else logger.debug(message + ' (attempt ' + trouble.failures + ')');
  }

  function backingOff(slot: ControllerSlotId): boolean {
    const trouble = troubles.get(slot);
    if (!trouble || trouble.skip === 0) return false;
    trouble.skip--;
    return true;
  }

  function ingest(pad: OpenPad, chunk: Buffer): void {
    if (!pad.received) {
      pad.received = true;
      troubles.delete(pad.slot);
    }
    const buffer = pad.remainder.length > 0 ? Buffer.concat([pad.remainder, chunk]) : chunk;
    const parsed = parseJsEvents(buffer);
    for (const event of parsed.events) {
      applyJsEvent(pad.state, event, config.axisMax);
    }
    pad.remainder = Buffer.from(parsed.remainder);
  }

  function open(slot: ControllerSlotId): OpenPad | null {
    const path = devicePath(slot);
    if (!fs.exists(path)) return null;
    if (!fs.readable(path)) {
      noteFailure(slot, 'Cannot read ' + path + ' (check the permissions of the input group)');
      return null;
    }

    let stream: Readable;
    try {
      stream = fs.open(path);
    } catch (err) {
      noteFailure(slot, 'Cannot open ' + path + ': ' + String(err));
      return null;
    }

    const pad: OpenPad = {
      slot: slot,
      path: path,
      stream: stream,
      state: { axes: [], buttons: [] },
      remainder: Buffer.alloc(0),
      active: true,
      received: false
    };

    stream.on('data', function (chunk: Buffer) {
      ingest(pad, chunk);
    });
    stream.on('error', function (err: Error) {
      pad.active = false;
      noteFailure(slot, 'Controller js' + slot + ' lost: ' + err.message);
      stream.destroy();
    });
    stream.on('close', function () {
      pad.active = false;
    });

    pads.set(slot, pad);
    if (logger) logger.debug('Reading ' + path);
    return pad;
  }

  function release(slot: ControllerSlotId): void {
    const pad = pads.get(slot);
    if (!pad) return;
    pads.delete(slot);
    pad.active = false;
    pad.stream.destroy();
  }

  function read(slot: ControllerSlotId): RawPadSnapshot | null {
    let pad = pads.get(slot);
    if (!pad || !pad.active) {
      if (pad) release(slot);
      if (backingOff(slot)) return null;
      const opened = open(slot);
      if (opened === null) return null;
      pad = opened;
    }
    // The kernel replays the current state on open, so silence means no access yet
    if (!pad.received) return null;
    return { axes: pad.state.axes.slice(), buttons: pad.state.buttons.slice() };
  }

  function listSlots(): ControllerSlotInfo[] {
    const slots: number[] = [];
    for (const entry of fs.list(config.deviceDir)) {
      const slot = parseSlotName(entry);
      if (slot !== null) slots.push(slot);
    }
    slots.sort(function (a, b) { return a - b; });

    return slots.map(function (slot) {
      return { slot: slot, name: deviceName(slot), path: devicePath(slot) };
    });
  }

  function close(): void {
    for (const slot of Array.from(pads.keys())) {
      release(slot);
    }
    troubles.clear();
  }

  return {
    listSlots: listSlots,
    read: read,
    release: release,
    close: close
  };
}
