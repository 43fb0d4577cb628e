/**
 * Tests for the device scanner
 */

import { ScanUnavailableError } from '$types/errors';

import { createDeviceScanner } from './scanner';
import type { Advertisement, RadioAPI, RadioState, TimerAPI } from '$types';
import type { Logger } from '@logging';

function advertisement(name: string, address: string, connectable = true): Advertisement {
  return { handle: { id: address }, address: address, name: name, rssi: -60, connectable: connectable };
}

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function fakeTimer() {
  const callbacks = new Map<number, () => void>();
  let next = 1;
  const timer: TimerAPI = {
    set: function (_ms, _repeat, callback) {
      const handle = next++;
      callbacks.set(handle, callback);
      return handle;
    },
    clear: function (handle) {
      callbacks.delete(handle);
    }
  };
  return {
    timer: timer,
    pending: function () { return callbacks.size; },
    fire: function () {
      for (const [handle, callback] of Array.from(callbacks)) {
        callbacks.delete(handle);
        callback();
      }
    }
  };
}

/** Radio that replays a fixed set of advertisements when a scan starts */
function fakeRadio(advertisements: Advertisement[], state: RadioState = 'poweredOn') {
  const stop = vi.fn(() => Promise.resolve());
  const startScan = vi.fn(function (listener: (advertisement: Advertisement) => void) {
    advertisements.forEach(listener);
    return Promise.resolve({ stop: stop });
  });
  const radio: RadioAPI = {
    getState: function () { return state; },
    waitForPoweredOn: function () { return Promise.resolve(state === 'poweredOn'); },
    startScan: startScan,
    connect: function () { return Promise.reject(new Error('not used')); }
  };
  return { radio: radio, stop: stop, startScan: startScan };
}

describe('createDeviceScanner', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = {
      log: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warning: vi.fn(),
      critical: vi.fn(),
      scope: function () { return logger; }
    };
  });

  it('should keep one device per matching connectable address', async () => {
    const { radio, stop } = fakeRadio([
      advertisement('SL-SF-24', 'AA:01'),
      advertisement('RandomDevice', 'AA:02'),
      advertisement('SL-SF-24', 'aa:01'),
      advertisement('SL-296 GTB', 'AA:03', false),
      advertisement('', 'AA:04')
    ]);
    const clock = fakeTimer();
    const scanner = createDeviceScanner({ radio: radio, timer: clock.timer, logger: logger, readyTimeoutMs: 1000 });

    const pending = scanner.collect(3000);
    await flush();
    clock.fire();
    const devices = await pending;

    expect(devices.map((d) => d.model.internalName)).toEqual(['SF24']);
    expect(devices[0].address).toBe('AA:01');
    expect(stop).toHaveBeenCalledTimes(1);
  });

  it('should keep iterating until the window closes', async () => {
    const { radio } = fakeRadio([advertisement('SL-F1-75', 'AA:10'), advertisement('SL-499P N', 'AA:11')]);
    const clock = fakeTimer();
    const scanner = createDeviceScanner({ radio: radio, timer: clock.timer, logger: logger, readyTimeoutMs: 1000 });

    const pending = scanner.collect(3000);
    await flush();

    expect(clock.pending()).toBe(1);
    clock.fire();

    const devices = await pending;
    expect(devices.map((d) => d.model.internalName)).toEqual(['F175', '499P(2024)']);
  });

  it('should stop the radio scan when the consumer stops early', async () => {
    const { radio, stop } = fakeRadio([advertisement('SL-F1-75', 'AA:10'), advertisement('SL-SF-23', 'AA:11')]);
    const clock = fakeTimer();
    const scanner = createDeviceScanner({ radio: radio, timer: clock.timer, logger: logger, readyTimeoutMs: 1000 });
    const names: string[] = [];

    for await (const device of scanner.scan(3000)) {
      names.push(device.advertisedName);
      break;
    }

    expect(names).toEqual(['SL-F1-75']);
    expect(stop).toHaveBeenCalledTimes(1);
    expect(clock.pending()).toBe(0);
  });

  it('should end the window when the signal aborts', async () => {
    const { radio, stop } = fakeRadio([advertisement('SL-F1-75', 'AA:10')]);
    const clock = fakeTimer();
    const scanner = createDeviceScanner({ radio: radio, timer: clock.timer, logger: logger, readyTimeoutMs: 1000 });
    const controller = new AbortController();

    const pending = scanner.collect(3000, controller.signal);
    await flush();
    controller.abort();
    const devices = await pending;

    expect(devices).toHaveLength(1);
    expect(stop).toHaveBeenCalledTimes(1);
    expect(clock.pending()).toBe(0);
  });

  it('should not start a scan when already aborted', async () => {
    const { radio, startScan } = fakeRadio([advertisement('SL-F1-75', 'AA:10')]);
    const clock = fakeTimer();
    const scanner = createDeviceScanner({ radio: radio, timer: clock.timer, logger: logger, readyTimeoutMs: 1000 });
    const controller = new AbortController();
    controller.abort();

    const devices = await scanner.collect(3000, controller.signal);

    expect(devices).toEqual([]);
    expect(startScan).not.toHaveBeenCalled();
  });

  it('should be restartable', async () => {
    const { radio, startScan } = fakeRadio([advertisement('SL-F1-75', 'AA:10')]);
    const clock = fakeTimer();
    const scanner = createDeviceScanner({ radio: radio, timer: clock.timer, logger: logger, readyTimeoutMs: 1000 });

    for (let round = 0; round < 2; round++) {
      const pending = scanner.collect(3000);
      await flush();
      clock.fire();
      expect(await pending).toHaveLength(1);
    }

    expect(startScan).toHaveBeenCalledTimes(2);
  });

  it('should throw when the radio is not powered on', async () => {
    const { radio, startScan } = fakeRadio([], 'poweredOff');
    const clock = fakeTimer();
    const scanner = createDeviceScanner({ radio: radio, timer: clock.timer, logger: logger, readyTimeoutMs: 1000 });

    await expect(scanner.collect(3000)).rejects.toThrow(ScanUnavailableError);
    await expect(scanner.collect(3000)).rejects.toThrow('Bluetooth radio unavailable (state: poweredOff)');
    expect(startScan).not.toHaveBeenCalled();
  });
});
