/**
 * Radio helpers
 */

import { matchModel } from '@core/catalog';

import type { Advertisement, BridgeConfig, CarModel, RadioState } from '$types';
import type { DiscoveredDevice, LinkManagerConfig } from './types';

/**
 * Match an advertisement against the catalog
 *
 * @returns The device, or null for non-connectable, unnamed or unknown peripherals
 */
export function toDiscoveredDevice(
  advertisement: Advertisement,
  models?: readonly CarModel[]
): DiscoveredDevice | null {
  if (!advertisement.connectable) return null;

  const name = advertisement.name.trim();
  if (name.length === 0) return null;

  const model = matchModel(name, models);
  if (model === null) return null;

  return Object.freeze({
    model: model,
    advertisedName: name,
    address: advertisement.address,
    rssi: advertisement.rssi,
    handle: advertisement.handle
  });
}

/**
 * Normalized address used for de-duplication
 */
export function addressKey(address: string): string {
  return address.trim().toLowerCase();
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Build the link settings from the bridge configuration
 */
export function toLinkConfig(config: BridgeConfig): LinkManagerConfig {
  return {
    connectTimeoutMs: config.CONNECT_TIMEOUT_MS,
    controlServiceUuid: config.CONTROL_SERVICE_UUID,
    commandCharacteristicUuid: config.COMMAND_CHARACTERISTIC_UUID,
    statusCharacteristicUuid: config.STATUS_CHARACTERISTIC_UUID,
    batteryServiceUuid: config.BATTERY_SERVICE_UUID,
    batteryCharacteristicUuid: config.BATTERY_CHARACTERISTIC_UUID
  };
}

const BASE_UUID_SUFFIX = '00001000800000805f9b34fb';

/**
 * UUID in the form noble reports it: lowercase, no dashes, 16-bit when it
 * sits on the Bluetooth base UUID
 */
export function toShortUuid(uuid: string): string {
  const compact = uuid.replace(/-/g, '').toLowerCase();
  if (compact.length === 32 && compact.startsWith('0000') && compact.endsWith(BASE_UUID_SUFFIX)) {
    return compact.slice(4, 8);
  }
  return compact;
}

const RADIO_STATES: readonly RadioState[] = [
  'unknown',
  'resetting',
  'unsupported',
  'unauthorized',
  'poweredOff',
  'poweredOn'
];

/**
 * Map an adapter state string onto RadioState ('unknown' when unrecognized)
 */
export function toRadioState(value: string): RadioState {
  for (const state of RADIO_STATES) {
    if (state === value) return state;
  }
  return 'unknown';
}

/**
 * Settle with promise, or reject once signal aborts
 *
 * The underlying operation keeps running; only the wait is cut short.
 */
export function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(new Error('aborted'));

  return new Promise<T>(function (resolve, reject) {
    function onAbort(): void {
      reject(new Error('aborted'));
    }
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(function (value) {
      signal.removeEventListener('abort', onAbort);
      resolve(value);
    }, function (err: unknown) {
      signal.removeEventListener('abort', onAbort);
      reject(err);
    });
  });
}
