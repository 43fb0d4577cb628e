/**
 * Tests for CLI helpers
 */

import { InvalidInputError, ScanUnavailableError } from '$types';
import {
  formatController,
  formatDevice,
  formatModel,
  formatScanUnavailable,
  parseChoice,
  parseTargets,
  planDrive
} from './commands';

import type { CarModel } from '$types';
import type { DiscoveredDevice } from '@hardware/radio/types';

const TESTCAR: CarModel = { internalName: 'TC01', displayName: 'Test Car', bluetoothName: 'SL-Test Car' };
const HIDDEN: CarModel = { internalName: 'TC99', displayName: '', bluetoothName: null };

function device(address: string, rssi: number = -60): DiscoveredDevice {
  return { model: TESTCAR, advertisedName: 'SL-Test Car', address: address, rssi: rssi, handle: { id: address } };
}

describe('parseTargets', () => {
  it('should use the default slot for bare addresses', () => {
    expect(parseTargets(['AA:BB'], 2)).toEqual([{ slot: 2, address: 'AA:BB' }]);
  });

  it('should parse slot=address pairs', () => {
    expect(parseTargets(['0=aa:01', ' 1 = aa:02 '], 0)).toEqual([
      { slot: 0, address: 'aa:01' },
      { slot: 1, address: 'aa:02' }
    ]);
  });

  it('should return nothing for no arguments', () => {
    expect(parseTargets([], 0)).toEqual([]);
  });

  it('should reject malformed targets', () => {
    expect(() => parseTargets(['x=aa:01'], 0)).toThrow('Invalid target "x=aa:01" (expected slot=address)');
    expect(() => parseTargets(['1='], 0)).toThrow(InvalidInputError);
    expect(() => parseTargets(['-1=aa:01'], 0)).toThrow(InvalidInputError);
  });

  it('should reject a slot used twice', () => {
    expect(() => parseTargets(['0=aa:01', '0=aa:02'], 0)).toThrow('Slot 0 is given more than one car');
  });

  it('should reject an address listed twice, ignoring case', () => {
    expect(() => parseTargets(['0=AA:01', '1=aa:01'], 0)).toThrow('aa:01 is listed more than once');
  });
});

describe('planDrive', () => {
  it('should fail when the scan found nothing', () => {
    expect(() => planDrive([], [], 0)).toThrow('No supported cars found');
  });

  it('should drive a single car from the default slot', () => {
    const car = device('aa:01');

    expect(planDrive([car], [], 3)).toEqual({ kind: 'drive', pairs: [{ slot: 3, device: car }] });
  });

  it('should ask to choose between several cars', () => {
    const cars = [device('aa:01'), device('aa:02')];

    expect(planDrive(cars, [], 0)).toEqual({ kind: 'choose', devices: cars });
  });

  it('should pair targets with scanned cars by address', () => {
    const first = device('aa:01');
    const second = device('aa:02');

    const plan = planDrive([first, second], [{ slot: 1, address: 'AA:02' }, { slot: 0, address: 'aa:01' }], 0);

    expect(plan).toEqual({
      kind: 'drive',
      pairs: [{ slot: 1, device: second }, { slot: 0, device: first }]
    });
  });

  it('should fail for a target that was not heard', () => {
    expect(() => planDrive([device('aa:01')], [{ slot: 0, address: 'aa:09' }], 0))
      .toThrow('aa:09 was not found in the scan');
  });
});

describe('parseChoice', () => {
  it('should map 1-based answers to indices', () => {
    expect(parseChoice('1', 3)).toBe(0);
    expect(parseChoice(' 3 ', 3)).toBe(2);
  });

  it('should return null for answers outside the list', () => {
    expect(parseChoice('0', 3)).toBeNull();
    expect(parseChoice('4', 3)).toBeNull();
    expect(parseChoice('two', 3)).toBeNull();
    expect(parseChoice('', 3)).toBeNull();
  });
});

describe('listings', () => {
  it('should format a model', () => {
    expect(formatModel(TESTCAR)).toBe('TC01  Test Car  SL-Test Car');
    expect(formatModel(HIDDEN)).toBe('TC99  TC99  (not advertised)');
  });

  it('should format a controller slot', () => {
    expect(formatController({ slot: 0, name: 'Test Pad', path: '/dev/input/js0' }))
      .toBe('slot 0: Test Pad (/dev/input/js0)');
  });

  it('should format a scanned car', () => {
    expect(formatDevice(device('aa:01', -48))).toBe('aa:01  Test Car  "SL-Test Car"  -48 dBm');
    expect(formatDevice(device('aa:01', -48), 2)).toBe('2) aa:01  Test Car  "SL-Test Car"  -48 dBm');
  });
});

describe('formatScanUnavailable', () => {
  it('should print the radio state and the pairing fallback', () => {
    expect(formatScanUnavailable(new ScanUnavailableError('poweredOff'))).toEqual([
      'Bluetooth radio unavailable (state: poweredOff)',
      'Hint: Turn the Bluetooth adapter on, or pair the car in the system Bluetooth settings.'
    ]);
  });
});
