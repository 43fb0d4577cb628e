/**
 * Control loop module
 */

export { createControlLoop } from './control';
export {
  detectPressEdges,
  applyToggleEdges,
  describeToggleChange,
  computeBackoffDelay,
  toControlLoopConfig
} from './helpers';

export type {
  TickOutcome,
  ButtonEdges,
  ControlLoopConfig,
  ControlLoopDependencies,
  ControlLoop
} from './types';
