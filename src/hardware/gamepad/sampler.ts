/**
 * Input sampler
 *
 * Turns raw controller snapshots into a ControllerState: dead-zone, optional
 * inversion, clamping, then the accelerate/brake override.
 */

import { ControllerUnavailableError } from '$types/errors';
import { clamp } from '@utils/number';

import { applyDeadzone, readAxis, readButton, resolveThrottle } from './helpers';

import type { BridgeConfig, ControllerSlotId, ControllerState, GamepadAPI } from '$types';
import type { InputSampler, SamplerConfig } from './types';

/**
 * Resting value of an analog trigger
 */
const TRIGGER_REST = -1;

/**
 * Build the sampler settings from the bridge configuration
 */
export function toSamplerConfig(config: BridgeConfig): SamplerConfig {
  return {
    deadzone: config.DEADZONE,
    steeringAxis: config.STEERING_AXIS,
    throttleAxis: config.THROTTLE_AXIS,
    invertSteering: config.INVERT_STEERING,
    invertThrottle: config.INVERT_THROTTLE,
    turboAxes: config.TURBO_AXES,
    triggerPressThreshold: config.TRIGGER_PRESS_THRESHOLD,
    buttons: {
      accelerate: config.BUTTON_ACCELERATE,
      brake: config.BUTTON_BRAKE,
      mode: config.BUTTON_MODE,
      donut: config.BUTTON_DONUT,
      lights: config.BUTTON_LIGHTS,
      battery: config.BUTTON_BATTERY
    }
  };
}

/**
 * Create an input sampler over a gamepad backend
 *
 * @param gamepad - Raw controller access
 * @param config - Axis, button and dead-zone settings
 */
export function createInputSampler(gamepad: GamepadAPI, config: SamplerConfig): InputSampler {
  const steeringSign = config.invertSteering ? -1 : 1;
  const throttleSign = config.invertThrottle ? -1 : 1;

  function normalizeAxis(value: number, sign: number): number {
    return clamp(applyDeadzone(value * sign, config.deadzone), -1, 1);
  }

  function sample(slot: ControllerSlotId): ControllerState {
    const raw = gamepad.read(slot);
    if (raw === null) {
      throw new ControllerUnavailableError(slot);
    }

    const steering = normalizeAxis(readAxis(raw, config.steeringAxis), steeringSign);
    const throttle = resolveThrottle(
      normalizeAxis(readAxis(raw, config.throttleAxis), throttleSign),
      readButton(raw, config.buttons.accelerate),
      readButton(raw, config.buttons.brake)
    );

    let turbo = false;
    for (const axis of config.turboAxes) {
      if (readAxis(raw, axis, TRIGGER_REST) > config.triggerPressThreshold) {
        turbo = true;
      }
    }

    return Object.freeze({
      steering: steering,
      throttle: throttle,
      buttons: Object.freeze({
        turbo: turbo,
        lights: readButton(raw, config.buttons.lights),
        donut: readButton(raw, config.buttons.donut),
        mode: readButton(raw, config.buttons.mode),
        battery: readButton(raw, config.buttons.battery)
      })
    });
  }

  return {
    sample: sample,
    listSlots: function () {
      return gamepad.listSlots();
    },
    release: function (slot: ControllerSlotId) {
      gamepad.release(slot);
    }
  };
}
