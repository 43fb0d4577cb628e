/**
 * Tests for the Linux joystick driver
 */

import { PassThrough } from 'node:stream';

import { createJoystickDriver, REOPEN_BACKOFF_READS } from './joystick-driver';

import type { Logger } from '@logging';
import type { JoystickFs } from './types';

const CONFIG = { deviceDir: '/dev/input', nameRoot: '/sys/class/input', axisMax: 32767 };

function jsEvent(value: number, type: number, number: number): Buffer {
  const buffer = Buffer.alloc(8);
  buffer.writeInt16LE(value, 4);
  buffer.writeUInt8(type, 6);
  buffer.writeUInt8(number, 7);
  return buffer;
}

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function fakeFs(devices: string[], names: Record<string, string> = {}, refused: string[] = []) {
  const opened: PassThrough[] = [];
  const fs: JoystickFs = {
    list: function () {
      return devices.slice();
    },
    exists: function (path: string) {
      return devices.some((name) => '/dev/input/' + name === path);
    },
    readable: function (path: string) {
      return !refused.some((name) => '/dev/input/' + name === path);
    },
    readText: function (path: string) {
      return names[path] ?? null;
    },
    open: function () {
      const stream = new PassThrough();
      opened.push(stream);
      return stream;
    }
  };
  return { fs: fs, opened: opened };
}

describe('createJoystickDriver', () => {
  it('should list jsN devices sorted by slot with their names', () => {
    const { fs } = fakeFs(['js1', 'event3', 'js0'], {
      '/sys/class/input/js0/device/name': 'Wireless Controller\n'
    });
    const driver = createJoystickDriver(CONFIG, fs);

    expect(driver.listSlots()).toEqual([
      { slot: 0, name: 'Wireless Controller', path: '/dev/input/js0' },
      { slot: 1, name: 'Joystick 1', path: '/dev/input/js1' }
    ]);
  });

  it('should return null for an empty slot', () => {
    const { fs, opened } = fakeFs([]);
    const driver = createJoystickDriver(CONFIG, fs);

    expect(driver.read(0)).toBeNull();
    expect(opened).toHaveLength(0);
  });

  it('should fold streamed events into the snapshot', async () => {
    const { fs, opened } = fakeFs(['js0']);
    const driver = createJoystickDriver(CONFIG, fs);

    expect(driver.read(0)).toBeNull();

    opened[0].write(Buffer.concat([jsEvent(16384, 0x82, 0), jsEvent(1, 0x01, 3)]));
    await flush();

    const snapshot = driver.read(0);
    expect(snapshot?.axes[0]).toBeCloseTo(0.5, 3);
    expect(snapshot?.buttons).toEqual([false, false, false, true]);
    expect(opened).toHaveLength(1);
  });

  it('should join a record split across chunks', async () => {
    const { fs, opened } = fakeFs(['js0']);
    const driver = createJoystickDriver(CONFIG, fs);
    driver.read(0);

    const record = jsEvent(-32767, 0x02, 1);
    opened[0].write(record.subarray(0, 5));
    await flush();
    opened[0].write(record.subarray(5));
    await flush();

    expect(driver.read(0)?.axes).toEqual([0, -1]);
  });

  it('should reopen the device after the stream closes', async () => {
    const devices = ['js0'];
    const { fs, opened } = fakeFs(devices);
    const driver = createJoystickDriver(CONFIG, fs);
    driver.read(0);

    opened[0].destroy();
    await flush();

    expect(driver.read(0)).toBeNull();
    expect(opened).toHaveLength(2);

    opened[1].write(jsEvent(1, 0x81, 0));
    await flush();
    expect(driver.read(0)).toEqual({ axes: [], buttons: [true] });
  });

  it('should report a node it may not read as missing and warn once', () => {
    const logger: Logger = {
      log: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warning: vi.fn(),
      critical: vi.fn(),
      scope: function () { return logger; }
    };
    const { fs, opened } = fakeFs(['js0'], {}, ['js0']);
    const readable = vi.spyOn(fs, 'readable');
    const driver = createJoystickDriver(CONFIG, fs, logger);

    for (let i = 0; i < REOPEN_BACKOFF_READS + 2; i++) {
      expect(driver.read(0)).toBeNull();
    }

    expect(opened).toHaveLength(0);
    expect(readable).toHaveBeenCalledTimes(2);
    expect(logger.warning).toHaveBeenCalledTimes(1);
    expect(logger.warning).toHaveBeenCalledWith(
      'Cannot read /dev/input/js0 (check the permissions of the input group)'
    );
    expect(logger.debug).toHaveBeenCalledWith(
      'Cannot read /dev/input/js0 (check the permissions of the input group) (attempt 2)'
    );
  });

  it('should back off reopening a node whose stream keeps failing', async () => {
    const { fs, opened } = fakeFs(['js0']);
    const driver = createJoystickDriver(CONFIG, fs);
    driver.read(0);

    opened[0].destroy(new Error('EACCES: permission denied'));
    await flush();

    for (let i = 0; i < REOPEN_BACKOFF_READS; i++) {
      expect(driver.read(0)).toBeNull();
    }
    expect(opened).toHaveLength(1);

    expect(driver.read(0)).toBeNull();
    expect(opened).toHaveLength(2);
  });

  it('should report an unplugged controller as missing', async () => {
    const devices = ['js0'];
    const { fs, opened } = fakeFs(devices);
    const driver = createJoystickDriver(CONFIG, fs);
    driver.read(0);

    devices.length = 0;
    opened[0].destroy();
    await flush();

    expect(driver.read(0)).toBeNull();
  });

  it('should destroy the stream on release and close', () => {
    const { fs, opened } = fakeFs(['js0', 'js1']);
    const driver = createJoystickDriver(CONFIG, fs);
    driver.read(0);
    driver.read(1);

    driver.release(0);
    expect(opened[0].destroyed).toBe(true);
    expect(opened[1].destroyed).toBe(false);

    driver.close();
    expect(opened[1].destroyed).toBe(true);
  });
});
