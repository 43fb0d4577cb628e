/**
 * Controller input module
 */

export { createInputSampler, toSamplerConfig } from './sampler';
export { createJoystickDriver, NODE_JOYSTICK_FS } from './joystick-driver';
export { applyDeadzone, readAxis, readButton, resolveThrottle, parseJsEvents } from './helpers';

export type { InputSampler, SamplerConfig, ButtonMap, JoystickFs, JoystickDriverConfig } from './types';
