/**
 * RadioAPI over @abandonware/noble
 *
 * noble opens the HCI socket as soon as it is required, so the module is
 * loaded on first use; commands that never touch the radio (models,
 * controllers) run on machines without an adapter.
 */

import { errorMessage, toRadioState, toShortUuid } from './helpers';

import type { Characteristic, Peripheral } from '@abandonware/noble';
import type {
  Advertisement,
  PeripheralHandle,
  RadioAPI,
  RadioCharacteristic,
  RadioLink,
  RadioState,
  ScanSession,
  TimerAPI
} from '$types';
import type { Logger } from '@logging';

type NobleModule = typeof import('@abandonware/noble');

/**
 * Create the noble-backed radio
 *
 * @param timer - Timer used for the power-on wait
 * @param logger - Logger for adapter messages
 */
export function createNobleRadio(timer: TimerAPI, logger: Logger): RadioAPI {
  let noble: NobleModule | null = null;
  const peripherals = new Map<string, Peripheral>();

  function load(): NobleModule {
    if (noble !== null) return noble;
    // eslint-disable-next-line @typescript-eslint/no-require-imports
    const loaded: NobleModule = require('@abandonware/noble');
    noble = loaded;
    logger.debug('noble loaded, adapter state ' + loaded._state);
    return loaded;
  }

  // ═══════════════════════════════════════════════════════════════
  // CHARACTERISTICS AND LINKS
  // ═══════════════════════════════════════════════════════════════

  function wrapCharacteristic(characteristic: Characteristic): RadioCharacteristic {
    return {
      write: function (data: Uint8Array, withoutResponse: boolean): Promise<void> {
        return characteristic.writeAsync(Buffer.from(data.buffer, data.byteOffset, data.byteLength), withoutResponse);
      },
      read: async function (): Promise<Uint8Array> {
        return await characteristic.readAsync();
      },
      subscribe: async function (listener: (data: Uint8Array) => void): Promise<() => void> {
        function onData(data: Buffer): void {
          listener(data);
        }
        characteristic.on('data', onData);
        try {
          await characteristic.subscribeAsync();
        } catch (err) {
          characteristic.removeListener('data', onData);
          throw err;
        }
        return function () {
          characteristic.removeListener('data', onData);
          characteristic.unsubscribeAsync().catch(function (err: unknown) {
            logger.debug('Unsubscribe from ' + characteristic.uuid + ' failed: ' + errorMessage(err));
          });
        };
      }
    };
  }

  function wrapPeripheral(peripheral: Peripheral): RadioLink {
    return {
      characteristic: async function (serviceUuid: string, characteristicUuid: string) {
        const result = await peripheral.discoverSomeServicesAndCharacteristicsAsync(
          [toShortUuid(serviceUuid)],
          [toShortUuid(characteristicUuid)]
        );
        const found = result.characteristics[0];
        return found === undefined ? null : wrapCharacteristic(found);
      },
      onDisconnect: function (listener: (reason: string) => void) {
        function onDisconnect(reason?: unknown): void {
          listener(reason === undefined || reason === null ? 'disconnected' : String(reason));
        }
        peripheral.on('disconnect', onDisconnect);
        return function () {
          peripheral.removeListener('disconnect', onDisconnect);
        };
      },
      disconnect: function () {
        return peripheral.disconnectAsync();
      }
    };
  }

  // ═══════════════════════════════════════════════════════════════
  // RADIO
  // ═══════════════════════════════════════════════════════════════

  function getState(): RadioState {
    return toRadioState(load()._state);
  }

  function waitForPoweredOn(timeoutMs: number): Promise<boolean> {
    const radio = load();
    if (toRadioState(radio._state) === 'poweredOn') {
      return Promise.resolve(true);
    }

    return new Promise<boolean>(function (resolve) {
      function finish(powered: boolean): void {
        timer.clear(handle);
        radio.removeListener('stateChange', onStateChange);
        resolve(powered);
      }
      function onStateChange(state: string): void {
        logger.debug('Adapter state ' + state);
        if (toRadioState(state) === 'poweredOn') finish(true);
      }
      const handle = timer.set(timeoutMs, false, function () {
        finish(false);
      });
      radio.on('stateChange', onStateChange);
    });
  }

  async function startScan(listener: (advertisement: Advertisement) => void): Promise<ScanSession> {
    const radio = load();

    function onDiscover(peripheral: Peripheral): void {
      peripherals.set(peripheral.id, peripheral);
      listener({
        handle: { id: peripheral.id },
        address: peripheral.address || peripheral.id,
        name: peripheral.advertisement.localName || '',
        rssi: peripheral.rssi,
        connectable: peripheral.connectable
      });
    }

    radio.on('discover', onDiscover);
    try {
      await radio.startScanningAsync([], false);
    } catch (err) {
      radio.removeListener('discover', onDiscover);
      throw err;
    }

    let stopped = false;
    return {
      stop: async function () {
        if (stopped) return;
        stopped = true;
        radio.removeListener('discover', onDiscover);
        await radio.stopScanningAsync();
      }
    };
  }

  function connect(handle: PeripheralHandle, signal: AbortSignal): Promise<RadioLink> {
    const known = peripherals.get(handle.id);
    if (known === undefined) {
      return Promise.reject(new Error('Unknown peripheral ' + handle.id + ' (not seen in a scan)'));
    }
    const peripheral: Peripheral = known;
    if (signal.aborted) {
      return Promise.reject(new Error('Connect aborted'));
    }

    return new Promise<RadioLink>(function (resolve, reject) {
      function onAbort(): void {
        peripheral.cancelConnect();
        reject(new Error('Connect aborted'));
      }
      signal.addEventListener('abort', onAbort);

      peripheral.connectAsync().then(
        function () {
          signal.removeEventListener('abort', onAbort);
          resolve(wrapPeripheral(peripheral));
        },
        function (err: unknown) {
          signal.removeEventListener('abort', onAbort);
          reject(err);
        }
      );
    });
  }

  return {
    getState: getState,
    waitForPoweredOn: waitForPoweredOn,
    startScan: startScan,
    connect: connect
  };
}
