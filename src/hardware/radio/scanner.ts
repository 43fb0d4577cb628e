/**
 * Device scanner
 *
 * Each scan() call is one finite discovery window. Matching devices are
 * yielded as they are heard; the radio scan is stopped when the window
 * closes, the consumer stops iterating or the signal aborts.
 */

import { ScanUnavailableError } from '$types/errors';

import { addressKey, toDiscoveredDevice } from './helpers';

import type { Advertisement } from '$types';
import type { DeviceScanner, DiscoveredDevice, ScannerDependencies } from './types';

/**
 * Create a device scanner
 */
export function createDeviceScanner(deps: ScannerDependencies): DeviceScanner {
  const radio = deps.radio;
  const timer = deps.timer;
  const logger = deps.logger;

  async function* scan(durationMs: number, signal?: AbortSignal): AsyncGenerator<DiscoveredDevice, void, undefined> {
    const powered = await radio.waitForPoweredOn(deps.readyTimeoutMs);
    if (!powered) {
      throw new ScanUnavailableError(radio.getState());
    }
    if (signal && signal.aborted) return;

    const queue: DiscoveredDevice[] = [];
    const seen = new Set<string>();
    let closed = false;
    let wake: (() => void) | null = null;

    function notify(): void {
      const resume = wake;
      wake = null;
      if (resume) resume();
    }

    function close(): void {
      closed = true;
      notify();
    }

    function onAdvertisement(advertisement: Advertisement): void {
      if (closed) return;

      const device = toDiscoveredDevice(advertisement, deps.models);
      if (device === null) return;

      const key = addressKey(device.address);
      if (seen.has(key)) return;
      seen.add(key);

      logger.debug('Found ' + device.advertisedName + ' at ' + device.address + ' (' + device.rssi + ' dBm)');
      queue.push(device);
      notify();
    }

    logger.debug('Scanning for ' + durationMs + ' ms');
    const session = await radio.startScan(onAdvertisement);
    const windowTimer = timer.set(durationMs, false, close);
    if (signal) signal.addEventListener('abort', close);

    try {
      while (!(signal && signal.aborted)) {
        const next = queue.shift();
        if (next !== undefined) {
          yield next;
          continue;
        }
        if (closed) break;
        await new Promise<void>(function (resolve) {
          wake = resolve;
        });
      }
    } finally {
      closed = true;
      timer.clear(windowTimer);
      if (signal) signal.removeEventListener('abort', close);
      await session.stop();
      logger.debug('Scan finished, ' + seen.size + ' device(s)');
    }
  }

  async function collect(durationMs: number, signal?: AbortSignal): Promise<DiscoveredDevice[]> {
    const devices: DiscoveredDevice[] = [];
    for await (const device of scan(durationMs, signal)) {
      devices.push(device);
    }
    return devices;
  }

  return {
    scan: scan,
    collect: collect
  };
}
