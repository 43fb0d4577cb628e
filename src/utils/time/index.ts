export { now, nowMs, monotonicMs } from './time';
export { createNodeTimer } from './timer';
