export { encode, encodeInto, decodeStatus, describeStatus, DEFAULT_TOGGLES } from './codec';
export { frameToHex, framesEqual } from './helpers';
export { FRAME_SIZE, FRAME_OFFSETS, ENGAGE_THRESHOLD } from './types';
export type { StatusReport, BatteryReport, EchoReport, RawReport } from './types';
