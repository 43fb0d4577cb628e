/**
 * Tests for the input sampler
 */

import { ControllerUnavailableError } from '$types/errors';
import CONFIG from '@boot/config';

import { createInputSampler, toSamplerConfig } from './sampler';
import type { GamepadAPI, RawPadSnapshot } from '$types';
import type { SamplerConfig } from './types';

const SETTINGS: SamplerConfig = {
  deadzone: 0.05,
  steeringAxis: 0,
  throttleAxis: 1,
  invertSteering: false,
  invertThrottle: true,
  turboAxes: [2, 5],
  triggerPressThreshold: -0.5,
  buttons: { accelerate: 0, brake: 1, mode: 2, donut: 3, lights: 6, battery: 7 }
};

function pad(snapshot: RawPadSnapshot | null): GamepadAPI {
  return {
    listSlots: vi.fn(() => [{ slot: 0, name: 'Test Pad', path: '/dev/input/js0' }]),
    read: vi.fn(() => snapshot),
    release: vi.fn(),
    close: vi.fn()
  };
}

describe('createInputSampler', () => {
  it('should apply dead-zone and throttle inversion', () => {
    const sampler = createInputSampler(pad({ axes: [0.03, -0.8, -1, 0, 0, -1], buttons: [] }), SETTINGS);

    const state = sampler.sample(0);

    expect(state.steering).toBe(0);
    expect(state.throttle).toBe(0.8);
    expect(state.buttons.turbo).toBe(false);
  });

  it('should invert steering when configured', () => {
    const sampler = createInputSampler(
      pad({ axes: [0.4, 0], buttons: [] }),
      { ...SETTINGS, invertSteering: true }
    );

    expect(sampler.sample(0).steering).toBe(-0.4);
  });

  it('should clamp out-of-range axes', () => {
    const sampler = createInputSampler(pad({ axes: [1.3, -32768 / 32767], buttons: [] }), SETTINGS);

    const state = sampler.sample(0);

    expect(state.steering).toBe(1);
    expect(state.throttle).toBe(1);
  });

  it('should force full throttle on accelerate', () => {
    const sampler = createInputSampler(pad({ axes: [0, 0], buttons: [true] }), SETTINGS);

    expect(sampler.sample(0).throttle).toBe(1);
  });

  it('should let brake win when both buttons are held', () => {
    const sampler = createInputSampler(pad({ axes: [0, -0.7], buttons: [true, true] }), SETTINGS);

    expect(sampler.sample(0).throttle).toBe(-1);
  });

  it('should hold turbo while any trigger is pressed', () => {
    const sampler = createInputSampler(pad({ axes: [0, 0, -1, 0, 0, 0], buttons: [] }), SETTINGS);

    expect(sampler.sample(0).buttons.turbo).toBe(true);
  });

  it('should treat missing trigger axes as released', () => {
    const sampler = createInputSampler(pad({ axes: [0, 0, -0.6], buttons: [] }), SETTINGS);

    expect(sampler.sample(0).buttons.turbo).toBe(false);
  });

  it('should map buttons by configured index', () => {
    const buttons = [false, false, true, false, false, false, true, false];
    const sampler = createInputSampler(pad({ axes: [], buttons: buttons }), SETTINGS);

    expect(sampler.sample(0).buttons).toEqual({
      turbo: false,
      lights: true,
      donut: false,
      mode: true,
      battery: false
    });
  });

  it('should return a frozen state', () => {
    const sampler = createInputSampler(pad({ axes: [], buttons: [] }), SETTINGS);

    const state = sampler.sample(0);

    expect(Object.isFrozen(state)).toBe(true);
    expect(Object.isFrozen(state.buttons)).toBe(true);
  });

  it('should throw when the slot is empty', () => {
    const sampler = createInputSampler(pad(null), SETTINGS);

    expect(() => sampler.sample(2)).toThrow(ControllerUnavailableError);
    expect(() => sampler.sample(2)).toThrow('No controller in slot 2');
  });

  it('should delegate slot listing and release', () => {
    const gamepad = pad(null);
    const sampler = createInputSampler(gamepad, SETTINGS);

    expect(sampler.listSlots()).toEqual([{ slot: 0, name: 'Test Pad', path: '/dev/input/js0' }]);
    sampler.release(0);

    expect(gamepad.release).toHaveBeenCalledWith(0);
  });
});

describe('toSamplerConfig', () => {
  it('should pick input settings from the bridge config', () => {
    const settings = toSamplerConfig(CONFIG);

    expect(settings.throttleAxis).toBe(4);
    expect(settings.invertThrottle).toBe(true);
    expect(settings.turboAxes).toEqual([2, 5]);
    expect(settings.buttons.lights).toBe(6);
  });
});
