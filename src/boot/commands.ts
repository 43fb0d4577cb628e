/**
 * CLI helpers
 *
 * Target parsing, car selection and listing formats for main.ts. Kept free
 * of I/O so the command actions stay thin.
 */

import { modelLabel } from '@core/catalog';
import { addressKey } from '@hardware/radio/helpers';
import { InvalidInputError } from '$types';

import type { CarModel, ControllerSlotId, ControllerSlotInfo, ScanUnavailableError } from '$types';
import type { DiscoveredDevice } from '@hardware/radio/types';

// ═══════════════════════════════════════════════════════════════
// TARGETS
// ═══════════════════════════════════════════════════════════════

/**
 * Car address requested on the command line, with its controller slot
 */
export interface DriveTarget {
  slot: ControllerSlotId;
  address: string;
}

/**
 * Scanned car paired with the slot that will drive it
 */
export interface DrivePair {
  slot: ControllerSlotId;
  device: DiscoveredDevice;
}

/**
 * What drive should do after a scan
 */
export type DrivePlan =
  | { kind: 'drive'; pairs: DrivePair[] }
  | { kind: 'choose'; devices: DiscoveredDevice[] };

const SLOT_PATTERN = /^\d+$/;

/**
 * Parse "slot=address" (or bare address) arguments
 *
 * @param args - Positional arguments of the drive command
 * @param defaultSlot - Slot for arguments without "slot="
 * @throws {InvalidInputError} On a malformed argument, a reused slot or a repeated address
 */
export function parseTargets(args: readonly string[], defaultSlot: ControllerSlotId): DriveTarget[] {
  const targets: DriveTarget[] = [];
  const slots = new Set<ControllerSlotId>();
  const addresses = new Set<string>();

  for (const arg of args) {
    const eq = arg.indexOf('=');
    const slotText = eq >= 0 ? arg.slice(0, eq).trim() : String(defaultSlot);
    const address = (eq >= 0 ? arg.slice(eq + 1) : arg).trim();

    if (!SLOT_PATTERN.test(slotText) || address === '') {
      throw new InvalidInputError('Invalid target "' + arg + '" (expected slot=address)');
    }

    const slot = Number(slotText);
    if (slots.has(slot)) {
      throw new InvalidInputError('Slot ' + slot + ' is given more than one car');
    }
    if (addresses.has(addressKey(address))) {
      throw new InvalidInputError(address + ' is listed more than once');
    }

    slots.add(slot);
    addresses.add(addressKey(address));
    targets.push({ slot: slot, address: address });
  }

  return targets;
}

/**
 * Pair scan results with the requested targets
 *
 * Without targets a single car is driven from defaultSlot; several cars
 * leave the choice to the user.
 *
 * @throws {InvalidInputError} When nothing was found or a target was not heard
 */
export function planDrive(
  devices: readonly DiscoveredDevice[],
  targets: readonly DriveTarget[],
  defaultSlot: ControllerSlotId
): DrivePlan {
  if (targets.length === 0) {
    if (devices.length === 0) {
      throw new InvalidInputError('No supported cars found');
    }
    if (devices.length === 1) {
      return { kind: 'drive', pairs: [{ slot: defaultSlot, device: devices[0] }] };
    }
    return { kind: 'choose', devices: devices.slice() };
  }

  const pairs = targets.map(function (target) {
    const key = addressKey(target.address);
    const device = devices.find(function (d) { return addressKey(d.address) === key; });
    if (device === undefined) {
      throw new InvalidInputError(target.address + ' was not found in the scan');
    }
    return { slot: target.slot, device: device };
  });

  return { kind: 'drive', pairs: pairs };
}

/**
 * Parse a 1-based menu answer
 * @returns Zero-based index, or null when the answer is not a listed number
 */
export function parseChoice(answer: string, count: number): number | null {
  const text = answer.trim();
  if (!SLOT_PATTERN.test(text)) return null;

  const choice = Number(text);
  return choice >= 1 && choice <= count ? choice - 1 : null;
}

// ═══════════════════════════════════════════════════════════════
// LISTINGS
// ═══════════════════════════════════════════════════════════════

export function formatModel(model: CarModel): string {
  const advertised = model.bluetoothName !== null ? model.bluetoothName : '(not advertised)';
  return model.internalName + '  ' + modelLabel(model) + '  ' + advertised;
}

export function formatController(info: ControllerSlotInfo): string {
  return 'slot ' + info.slot + ': ' + info.name + ' (' + info.path + ')';
}

/**
 * Problem and manual fallback for a radio that refused to scan
 */
export function formatScanUnavailable(err: ScanUnavailableError): string[] {
  return [err.message, 'Hint: ' + err.hint + '.'];
}

/**
 * One scan result; index is 1-based when given
 */
export function formatDevice(device: DiscoveredDevice, index?: number): string {
  const prefix = index !== undefined ? index + ') ' : '';
  return prefix + device.address + '  ' + modelLabel(device.model) +
    '  "' + device.advertisedName + '"  ' + device.rssi + ' dBm';
}
